/**
 * Collection Request Types
 * Layer: Domain
 *
 * What a caller sends, after the transport has unwrapped its envelope.
 * Fields the converter must check are optional here on purpose: a request
 * that type-checks can still have no valid operation (a create without
 * vectors, an alias action naming two actions at once).
 *
 * The four mutating requests share `WithTimeout`, which is all the
 * dispatcher needs to know about their wait budget.
 */
import type { HnswConfig, OptimizersConfig } from '@domain/entities/Collection';

export interface WithTimeout {
  /** Maximum wait in whole seconds; absent means the coordinator default. */
  timeout?: number;
}

export interface VectorParamsInput {
  size?: number;
  distance?: string;
  onDisk?: boolean;
}

export type VectorsInput = VectorParamsInput | Record<string, VectorParamsInput>;

export interface CreateCollectionRequest extends WithTimeout {
  collectionName: string;
  vectors?: VectorsInput;
  shardNumber?: number;
  replicationFactor?: number;
  writeConsistencyFactor?: number;
  onDiskPayload?: boolean;
  hnswConfig?: HnswConfig;
  optimizersConfig?: OptimizersConfig;
}

export interface UpdateCollectionRequest extends WithTimeout {
  collectionName: string;
  params?: {
    replicationFactor?: number;
    writeConsistencyFactor?: number;
    onDiskPayload?: boolean;
  };
  hnswConfig?: HnswConfig;
  optimizersConfig?: OptimizersConfig;
}

export interface DeleteCollectionRequest extends WithTimeout {
  collectionName: string;
}

/** Exactly one of the three members is expected per action. */
export interface AliasActionInput {
  createAlias?: { collectionName?: string; aliasName?: string };
  deleteAlias?: { aliasName?: string };
  renameAlias?: { oldAliasName?: string; newAliasName?: string };
}

export interface ChangeAliasesRequest extends WithTimeout {
  actions: AliasActionInput[];
}

export interface GetCollectionInfoRequest {
  collectionName: string;
}

export interface ListCollectionAliasesRequest {
  collectionName: string;
}
