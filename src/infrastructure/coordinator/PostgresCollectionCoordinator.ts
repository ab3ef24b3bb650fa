/**
 * PostgreSQL Collection Coordinator — Catalogue Implementation
 * Layer: Infrastructure
 * Pattern: Repository (implements ICoordinatorClient)
 *
 * I keep the collection catalogue in two tables (see migrations 001/002) and
 * apply every meta operation inside a single knex transaction, so a batch of
 * alias actions lands all-or-nothing. Two concurrent creates of the same name
 * are settled by the primary key: the loser's insert is ignored and reported
 * as `already_exists`.
 *
 * The wait budget from the request (or config.coordinator's default, capped at
 * its max) is enforced with withWaitTimeout(). Driver failures are classified
 * into CoordinatorError kinds before they leave this class.
 */
import { config } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type {
  AliasRecord,
  CollectionAliasRow,
  CollectionConfig,
  CollectionConfigDiff,
  CollectionDescription,
  CollectionInfo,
  CollectionRow,
} from '@domain/entities/Collection';
import type { ICoordinatorClient } from '@domain/interfaces/ICoordinatorClient';
import type {
  AliasOperation,
  CollectionMetaOperation,
} from '@domain/operations/CollectionMetaOperation';
import { CoordinatorError } from '@shared/errors/CoordinatorError';
import type { Duration } from '@shared/types';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

import { effectiveWaitTimeout, withWaitTimeout } from './waitPolicy';

const UNAVAILABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', '57P03']);
const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

/**
 * Sorts a thrown driver error into a CoordinatorError kind.
 *
 * Constraint violations come from writes that raced past the existence
 * checks: a unique violation means the name was taken meanwhile, a foreign
 * key violation that the target collection was deleted meanwhile.
 */
export function toCoordinatorError(err: unknown): CoordinatorError {
  if (err instanceof CoordinatorError) return err;
  if (err instanceof Error) {
    if (err.name === 'KnexTimeoutError') return new CoordinatorError('unavailable', err.message);
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    if (code === UNIQUE_VIOLATION) return new CoordinatorError('already_exists', err.message);
    if (code === FOREIGN_KEY_VIOLATION) return new CoordinatorError('not_found', err.message);
    if (code !== undefined && UNAVAILABLE_CODES.has(code)) {
      return new CoordinatorError('unavailable', err.message);
    }
    return new CoordinatorError('internal', err.message);
  }
  return new CoordinatorError('internal', String(err));
}

/** Fills the params a create left unset. */
export function withDefaultParams(config: CollectionConfig): CollectionConfig {
  const { params } = config;
  return {
    ...config,
    params: {
      shardNumber: params.shardNumber ?? 1,
      replicationFactor: params.replicationFactor ?? 1,
      writeConsistencyFactor: params.writeConsistencyFactor ?? 1,
      onDiskPayload: params.onDiskPayload ?? false,
    },
  };
}

/** Applies an update diff; keys absent from the diff keep their stored value. */
export function applyConfigDiff(
  current: CollectionConfig,
  diff: CollectionConfigDiff,
): CollectionConfig {
  return {
    ...current,
    params: { ...current.params, ...diff.params },
    hnswConfig: { ...current.hnswConfig, ...diff.hnswConfig },
    optimizersConfig: { ...current.optimizersConfig, ...diff.optimizersConfig },
  };
}

const collectionLabel = (name: string): string => `Collection \`${name}\``;
const aliasLabel = (name: string): string => `Alias \`${name}\``;

@injectable()
export class PostgresCollectionCoordinator implements ICoordinatorClient {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async submit(operation: CollectionMetaOperation, timeout?: Duration): Promise<boolean> {
    const wait = effectiveWaitTimeout(timeout, config.coordinator);
    try {
      const applied = await withWaitTimeout(this.apply(operation), wait, operation.kind);
      this.log.info({ operation: operation.kind, applied }, 'Collection meta operation applied');
      return applied;
    } catch (err) {
      throw toCoordinatorError(err);
    }
  }

  async listCollections(): Promise<CollectionDescription[]> {
    try {
      const rows: { name: string }[] = await this.db('collections').select('name').orderBy('name');
      return rows.map((row) => ({ name: row.name }));
    } catch (err) {
      throw toCoordinatorError(err);
    }
  }

  async listAliases(): Promise<AliasRecord[]> {
    try {
      const rows: CollectionAliasRow[] = await this.db('collection_aliases')
        .select('alias_name', 'collection_name')
        .orderBy('alias_name');
      return rows.map((row) => ({ aliasName: row.alias_name, collectionName: row.collection_name }));
    } catch (err) {
      throw toCoordinatorError(err);
    }
  }

  async collectionAliases(collectionName: string): Promise<string[]> {
    try {
      await this.requireCollection(this.db, collectionName);
      const rows: Pick<CollectionAliasRow, 'alias_name'>[] = await this.db('collection_aliases')
        .select('alias_name')
        .where('collection_name', collectionName)
        .orderBy('alias_name');
      return rows.map((row) => row.alias_name);
    } catch (err) {
      throw toCoordinatorError(err);
    }
  }

  async getCollectionInfo(collectionName: string): Promise<CollectionInfo> {
    try {
      const row: CollectionRow | undefined = await this.db('collections')
        .where('name', collectionName)
        .first();
      if (!row) throw CoordinatorError.notFound(`${collectionLabel(collectionName)} doesn't exist`);

      return {
        status: 'green',
        config: row.config,
        createdAt: row.created_at.toISOString(),
        updatedAt: row.updated_at.toISOString(),
      };
    } catch (err) {
      throw toCoordinatorError(err);
    }
  }

  private apply(operation: CollectionMetaOperation): Promise<boolean> {
    switch (operation.kind) {
      case 'CreateCollection':
        return this.createCollection(operation.collectionName, operation.config);
      case 'UpdateCollection':
        return this.updateCollection(operation.collectionName, operation.diff);
      case 'DeleteCollection':
        return this.deleteCollection(operation.collectionName);
      case 'ChangeAliases':
        return this.changeAliases(operation.actions);
    }
  }

  private async createCollection(name: string, collectionConfig: CollectionConfig): Promise<boolean> {
    return this.db.transaction(async (trx) => {
      const aliased = await trx('collection_aliases').where('alias_name', name).first();
      if (aliased) throw CoordinatorError.alreadyExists(aliasLabel(name));

      const inserted: { name: string }[] = await trx('collections')
        .insert({ name, config: JSON.stringify(withDefaultParams(collectionConfig)) })
        .onConflict('name')
        .ignore()
        .returning('name');
      if (inserted.length === 0) throw CoordinatorError.alreadyExists(collectionLabel(name));
      return true;
    });
  }

  private async updateCollection(name: string, diff: CollectionConfigDiff): Promise<boolean> {
    return this.db.transaction(async (trx) => {
      const row: Pick<CollectionRow, 'config'> | undefined = await trx('collections')
        .select('config')
        .where('name', name)
        .forUpdate()
        .first();
      if (!row) throw CoordinatorError.notFound(`${collectionLabel(name)} doesn't exist`);

      await trx('collections')
        .where('name', name)
        .update({
          config: JSON.stringify(applyConfigDiff(row.config, diff)),
          updated_at: trx.fn.now(),
        });
      return true;
    });
  }

  private async deleteCollection(name: string): Promise<boolean> {
    const deleted = await this.db('collections').where('name', name).del();
    return deleted > 0;
  }

  private async changeAliases(actions: AliasOperation[]): Promise<boolean> {
    return this.db.transaction(async (trx) => {
      for (const action of actions) {
        await this.applyAliasAction(trx, action);
      }
      return true;
    });
  }

  private async applyAliasAction(trx: Knex.Transaction, action: AliasOperation): Promise<void> {
    switch (action.kind) {
      case 'CreateAlias': {
        await this.requireCollection(trx, action.collectionName);
        const collection = await trx('collections').where('name', action.aliasName).first();
        if (collection) throw CoordinatorError.alreadyExists(collectionLabel(action.aliasName));

        const inserted: Pick<CollectionAliasRow, 'alias_name'>[] = await trx('collection_aliases')
          .insert({ alias_name: action.aliasName, collection_name: action.collectionName })
          .onConflict('alias_name')
          .ignore()
          .returning('alias_name');
        if (inserted.length === 0) throw CoordinatorError.alreadyExists(aliasLabel(action.aliasName));
        return;
      }
      case 'DeleteAlias': {
        const deleted = await trx('collection_aliases').where('alias_name', action.aliasName).del();
        if (deleted === 0) throw CoordinatorError.notFound(`${aliasLabel(action.aliasName)} doesn't exist`);
        return;
      }
      case 'RenameAlias': {
        const collection = await trx('collections').where('name', action.newAliasName).first();
        if (collection) throw CoordinatorError.alreadyExists(collectionLabel(action.newAliasName));
        const taken = await trx('collection_aliases').where('alias_name', action.newAliasName).first();
        if (taken) throw CoordinatorError.alreadyExists(aliasLabel(action.newAliasName));

        const renamed = await trx('collection_aliases')
          .where('alias_name', action.oldAliasName)
          .update({ alias_name: action.newAliasName });
        if (renamed === 0) {
          throw CoordinatorError.notFound(`${aliasLabel(action.oldAliasName)} doesn't exist`);
        }
        return;
      }
    }
  }

  private async requireCollection(db: Knex, name: string): Promise<void> {
    const row = await db('collections').select('name').where('name', name).first();
    if (!row) throw CoordinatorError.notFound(`${collectionLabel(name)} doesn't exist`);
  }
}
