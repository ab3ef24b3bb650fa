/**
 * Collections Service — Operation Dispatcher & Read Adapters
 * Layer: Application
 *
 * Every mutating request runs through the same pipeline in performOperation():
 *
 *   wait timeout → start clock → convert → submit → stop clock → respond
 *
 * A conversion failure ends the pipeline before the coordinator is touched.
 * A coordinator failure is classified through errorToStatus() and rethrown;
 * nothing is retried here. Adding a mutating operation means adding a request
 * type (WithTimeout) and a converter, never another pipeline.
 *
 * Read operations skip conversion: they call the coordinator directly, shape
 * the result and attach the elapsed time.
 *
 * The service keeps no per-call state. Its only field of note is the shared
 * coordinator, so any number of requests may be in flight at once.
 */
import { performance } from 'node:perf_hooks';

import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { AliasDescription } from '@domain/entities/Collection';
import type { ICoordinatorClient } from '@domain/interfaces/ICoordinatorClient';
import {
  convertChangeAliases,
  convertCreateCollection,
  convertDeleteCollection,
  convertUpdateCollection,
  type OperationConverter,
} from '@domain/operations/converters';
import type {
  ChangeAliasesRequest,
  CreateCollectionRequest,
  DeleteCollectionRequest,
  GetCollectionInfoRequest,
  ListCollectionAliasesRequest,
  UpdateCollectionRequest,
  WithTimeout,
} from '@domain/operations/requests';
import { waitTimeout } from '@domain/operations/waitTimeout';
import { CoordinatorError } from '@shared/errors/CoordinatorError';
import { errorToStatus } from '@shared/errors/errorToStatus';
import type {
  CollectionOperationResponse,
  GetCollectionInfoResponse,
  ListAliasesResponse,
  ListCollectionsResponse,
} from '@shared/types';
import { inject, injectable } from 'tsyringe';

function secondsSince(start: number): number {
  return (performance.now() - start) / 1000;
}

@injectable()
export class CollectionsService {
  constructor(
    @inject(TOKENS.CoordinatorClient) private coordinator: ICoordinatorClient,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  create(request: CreateCollectionRequest): Promise<CollectionOperationResponse> {
    return this.performOperation(request, convertCreateCollection);
  }

  update(request: UpdateCollectionRequest): Promise<CollectionOperationResponse> {
    return this.performOperation(request, convertUpdateCollection);
  }

  delete(request: DeleteCollectionRequest): Promise<CollectionOperationResponse> {
    return this.performOperation(request, convertDeleteCollection);
  }

  updateAliases(request: ChangeAliasesRequest): Promise<CollectionOperationResponse> {
    return this.performOperation(request, convertChangeAliases);
  }

  async get(request: GetCollectionInfoRequest): Promise<GetCollectionInfoResponse> {
    const timing = performance.now();
    const result = await this.callCoordinator(() =>
      this.coordinator.getCollectionInfo(request.collectionName),
    );
    return { result, time: secondsSince(timing) };
  }

  async list(): Promise<ListCollectionsResponse> {
    const timing = performance.now();
    const collections = await this.callCoordinator(() => this.coordinator.listCollections());
    return { collections, time: secondsSince(timing) };
  }

  async listAliases(): Promise<ListAliasesResponse> {
    const timing = performance.now();
    const records = await this.callCoordinator(() => this.coordinator.listAliases());
    const aliases = records.map(
      (record): AliasDescription => ({
        aliasName: record.aliasName,
        collectionName: record.collectionName,
      }),
    );
    return { aliases, time: secondsSince(timing) };
  }

  /**
   * Aliases of one collection. Each entry reports the collection name the
   * caller asked for, exactly as given, not anything the coordinator might
   * hold for the alias.
   */
  async listCollectionAliases(request: ListCollectionAliasesRequest): Promise<ListAliasesResponse> {
    const timing = performance.now();
    const { collectionName } = request;
    const aliasNames = await this.callCoordinator(() =>
      this.coordinator.collectionAliases(collectionName),
    );
    // TODO: cross-check against the coordinator's own alias → collection record once
    // ICoordinatorClient.collectionAliases returns AliasRecord[] instead of bare names.
    const aliases = aliasNames.map(
      (aliasName): AliasDescription => ({ aliasName, collectionName }),
    );
    return { aliases, time: secondsSince(timing) };
  }

  private async performOperation<R extends WithTimeout>(
    request: R,
    convert: OperationConverter<R>,
  ): Promise<CollectionOperationResponse> {
    const timeout = waitTimeout(request);
    const timing = performance.now();

    const conversion = convert(request);
    if (!conversion.ok) throw conversion.error;
    const { operation } = conversion;

    const result = await this.callCoordinator(() => this.coordinator.submit(operation, timeout));
    const time = secondsSince(timing);

    this.log.debug({ operation: operation.kind, result, time }, 'Collection operation submitted');
    return { result, time };
  }

  private async callCoordinator<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof CoordinatorError) throw errorToStatus(err);
      throw err;
    }
  }
}
