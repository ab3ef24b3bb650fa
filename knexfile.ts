/**
 * Knex Configuration (knexfile.ts)
 *
 * Tells the Knex CLI how to reach PostgreSQL and where the catalogue
 * migrations live. Connection settings come from src/core/config.ts, the same
 * source the service uses, keyed by NODE_ENV.
 *
 * Migrations are TypeScript under src/infrastructure/database/migrations/;
 * the CLI runs through `tsx` so they load without a build.
 *
 * Consumed by: `npm run migrate`, `npm run migrate:rollback`.
 */
import type { Knex } from 'knex';

import { config } from './src/core/config';
import path from 'node:path';

function getConnection(): Knex.PgConnectionConfig {
  return {
    connectionString: config.database.url,
    ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
  };
}

const migrations: Knex.MigratorConfig = {
  directory: path.join(__dirname, 'src/infrastructure/database/migrations'),
  extension: 'ts',
};

const knexConfig: Record<string, Knex.Config> = {
  development: {
    client: 'pg',
    connection: getConnection(),
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
    },
    migrations,
  },

  production: {
    client: 'pg',
    connection: getConnection(),
    pool: {
      min: config.database.pool.min,
      max: Math.max(config.database.pool.max, 20),
    },
    migrations,
  },
};

export default knexConfig;
