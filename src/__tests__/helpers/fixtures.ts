/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * sample* = one complete object. Timestamps are fixed for determinism.
 */
import type { CollectionConfig, CollectionInfo } from '@domain/entities/Collection';
import type {
  ChangeAliasesRequest,
  CreateCollectionRequest,
  DeleteCollectionRequest,
  UpdateCollectionRequest,
} from '@domain/operations/requests';

/** A valid create request with a single unnamed vector. */
export const sampleCreateRequest: CreateCollectionRequest = {
  collectionName: 'articles',
  vectors: { size: 384, distance: 'Cosine' },
  shardNumber: 2,
  hnswConfig: { m: 16, efConstruct: 100 },
};

/** A create request with no vectors — has no valid operation. */
export const sampleCreateWithoutVectors: CreateCollectionRequest = {
  collectionName: 'articles',
};

export const sampleUpdateRequest: UpdateCollectionRequest = {
  collectionName: 'articles',
  params: { replicationFactor: 3 },
};

/** An update that changes nothing — has no valid operation. */
export const sampleEmptyUpdateRequest: UpdateCollectionRequest = {
  collectionName: 'articles',
};

export const sampleDeleteRequest: DeleteCollectionRequest = {
  collectionName: 'articles',
};

/** A delete whose name can never be a collection — has no valid operation. */
export const sampleInvalidDeleteRequest: DeleteCollectionRequest = {
  collectionName: '',
};

export const sampleChangeAliasesRequest: ChangeAliasesRequest = {
  actions: [
    { createAlias: { collectionName: 'articles', aliasName: 'articles-live' } },
    { renameAlias: { oldAliasName: 'articles-old', newAliasName: 'articles-archive' } },
    { deleteAlias: { aliasName: 'articles-tmp' } },
  ],
};

/** An alias action that names two actions at once — has no valid operation. */
export const sampleMalformedAliasesRequest: ChangeAliasesRequest = {
  actions: [
    {
      createAlias: { collectionName: 'articles', aliasName: 'a' },
      deleteAlias: { aliasName: 'b' },
    },
  ],
};

export const sampleCollectionConfig: CollectionConfig = {
  vectors: { size: 384, distance: 'Cosine' },
  params: { shardNumber: 2, replicationFactor: 1, writeConsistencyFactor: 1, onDiskPayload: false },
  hnswConfig: { m: 16, efConstruct: 100 },
  optimizersConfig: {},
};

export const sampleCollectionInfo: CollectionInfo = {
  status: 'green',
  config: sampleCollectionConfig,
  createdAt: '2024-06-05T10:00:00.000Z',
  updatedAt: '2024-06-05T10:00:00.000Z',
};
