/**
 * Collection Entities
 * Layer: Domain
 *
 * The shapes a collection takes once it has passed conversion. Request
 * payloads (see operations/requests.ts) are looser: every field there is
 * optional until the converter has checked it.
 *
 * Same camelCase (domain) vs snake_case (row) split as elsewhere: the
 * *Row interfaces mirror the catalogue tables one-to-one.
 */
export const DISTANCES = ['Cosine', 'Euclid', 'Dot', 'Manhattan'] as const;

export type Distance = (typeof DISTANCES)[number];

export interface VectorParams {
  size: number;
  distance: Distance;
  onDisk?: boolean;
}

/** A single unnamed vector, or a map of named vectors. */
export type VectorsConfig = VectorParams | Record<string, VectorParams>;

export interface HnswConfig {
  m?: number;
  efConstruct?: number;
  fullScanThreshold?: number;
  onDisk?: boolean;
}

export interface OptimizersConfig {
  deletedThreshold?: number;
  vacuumMinVectorNumber?: number;
  defaultSegmentNumber?: number;
  indexingThreshold?: number;
  flushIntervalSec?: number;
}

export interface CollectionParams {
  shardNumber?: number;
  replicationFactor?: number;
  writeConsistencyFactor?: number;
  onDiskPayload?: boolean;
}

export interface CollectionConfig {
  vectors: VectorsConfig;
  params: CollectionParams;
  hnswConfig: HnswConfig;
  optimizersConfig: OptimizersConfig;
}

/** Partial update applied on top of a stored CollectionConfig. */
export interface CollectionConfigDiff {
  params?: Omit<CollectionParams, 'shardNumber'>;
  hnswConfig?: HnswConfig;
  optimizersConfig?: OptimizersConfig;
}

export type CollectionStatus = 'green' | 'yellow' | 'red';

export interface CollectionInfo {
  status: CollectionStatus;
  config: CollectionConfig;
  createdAt: string;
  updatedAt: string;
}

export interface CollectionDescription {
  name: string;
}

/** Alias as the coordinator stores it. */
export interface AliasRecord {
  aliasName: string;
  collectionName: string;
}

/** Alias as the API reports it. */
export interface AliasDescription {
  aliasName: string;
  collectionName: string;
}

export interface CollectionRow {
  name: string;
  config: CollectionConfig;
  created_at: Date;
  updated_at: Date;
}

export interface CollectionAliasRow {
  alias_name: string;
  collection_name: string;
}
