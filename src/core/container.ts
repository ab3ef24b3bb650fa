/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place where tokens are mapped to implementations.
 *
 *   - `reflect-metadata` must load first: @inject/@injectable store
 *     constructor metadata through the Reflect API.
 *   - `useValue` registers a pre-built singleton (logger, knex pool).
 *   - `useClass` lets tsyringe construct the class and inject its own
 *     dependencies on resolve.
 *
 * The coordinator is registered behind TOKENS.CoordinatorClient so the
 * collections service never names the Postgres catalogue directly; tests
 * re-register the token with a stub.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { TOKENS } from './types';
import { logger } from './logger';

import { getDbConnection } from '@infrastructure/database/connection';
import { PostgresCollectionCoordinator } from '@infrastructure/coordinator/PostgresCollectionCoordinator';
import { CollectionsService } from '@application/services/CollectionsService';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.Knex, { useValue: getDbConnection() });
container.register(TOKENS.CoordinatorClient, { useClass: PostgresCollectionCoordinator });
container.register(TOKENS.CollectionsService, { useClass: CollectionsService });

export { container };
