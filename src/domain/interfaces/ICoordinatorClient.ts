/**
 * Coordinator Client — The Single Backing Collaborator
 * Layer: Domain
 *
 * Everything the collections adapter needs from whatever actually owns
 * collection state. The adapter never looks past this interface: how an
 * operation is applied, replicated or stored is the implementation's concern
 * (PostgresCollectionCoordinator in this service, a jest.fn() stub in tests).
 *
 * Every method rejects with CoordinatorError on failure. Implementations must
 * be safe to call from many concurrent requests at once; the adapter holds a
 * single shared instance.
 */
import type {
  AliasRecord,
  CollectionDescription,
  CollectionInfo,
} from '@domain/entities/Collection';
import type { CollectionMetaOperation } from '@domain/operations/CollectionMetaOperation';
import type { Duration } from '@shared/types';

export interface ICoordinatorClient {
  /**
   * Apply a collection meta operation. `timeout` is the caller's wait budget;
   * undefined leaves the coordinator's own default in force. Resolves to
   * whether the operation took effect.
   */
  submit(operation: CollectionMetaOperation, timeout?: Duration): Promise<boolean>;

  listCollections(): Promise<CollectionDescription[]>;

  listAliases(): Promise<AliasRecord[]>;

  /** Alias names pointing at `collectionName`. */
  collectionAliases(collectionName: string): Promise<string[]>;

  getCollectionInfo(collectionName: string): Promise<CollectionInfo>;
}
