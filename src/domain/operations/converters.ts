/**
 * Request → Operation Converters
 * Layer: Domain
 *
 * One pure function per mutating request kind. Each returns a tagged
 * ConversionResult instead of throwing, so the dispatcher is the only place
 * that decides what a failure turns into. Nothing here performs I/O or
 * touches the request it was given.
 *
 * The checks are structural only: required sub-fields, numeric ranges that
 * make a config meaningless, alias actions that do not name exactly one
 * action. Whether a collection exists is for the coordinator to say.
 */
import {
  DISTANCES,
  type CollectionParams,
  type Distance,
  type HnswConfig,
  type OptimizersConfig,
  type VectorParams,
  type VectorsConfig,
} from '@domain/entities/Collection';
import type {
  AliasOperation,
  CollectionMetaOperation,
} from '@domain/operations/CollectionMetaOperation';
import type {
  AliasActionInput,
  ChangeAliasesRequest,
  CreateCollectionRequest,
  DeleteCollectionRequest,
  UpdateCollectionRequest,
  VectorParamsInput,
  VectorsInput,
} from '@domain/operations/requests';
import { ValidationError } from '@shared/errors/AppError';

export type ConversionResult =
  | { ok: true; operation: CollectionMetaOperation }
  | { ok: false; error: ValidationError };

export type OperationConverter<R> = (request: R) => ConversionResult;

export const MAX_COLLECTION_NAME_LENGTH = 255;

const FORBIDDEN_NAME_CHARS = /[/\\\0]/;

function ok(operation: CollectionMetaOperation): ConversionResult {
  return { ok: true, operation };
}

function fail(message: string): ConversionResult {
  return { ok: false, error: new ValidationError(message) };
}

/** Returns a problem description, or null when the name is usable. */
export function checkName(name: string | undefined, field: string): string | null {
  if (name === undefined || name.length === 0) return `${field} must not be empty`;
  if (name.length > MAX_COLLECTION_NAME_LENGTH) {
    return `${field} must be at most ${MAX_COLLECTION_NAME_LENGTH} characters`;
  }
  if (FORBIDDEN_NAME_CHARS.test(name)) {
    return `${field} must not contain "/", "\\" or NUL characters`;
  }
  return null;
}

function checkPositiveInt(value: number | undefined, field: string): string | null {
  if (value === undefined) return null;
  return Number.isInteger(value) && value > 0 ? null : `${field} must be a positive integer`;
}

function checkNonNegativeInt(value: number | undefined, field: string): string | null {
  if (value === undefined) return null;
  return Number.isInteger(value) && value >= 0 ? null : `${field} must be a non-negative integer`;
}

function firstProblem(...problems: (string | null)[]): string | null {
  return problems.find((problem) => problem !== null) ?? null;
}

function isDistance(value: string): value is Distance {
  return DISTANCES.some((distance) => distance === value);
}

function isSingleVectorParams(vectors: VectorsInput): vectors is VectorParamsInput {
  return Object.values(vectors).every((value) => typeof value !== 'object' || value === null);
}

function convertVectorParams(
  input: VectorParamsInput,
  field: string,
): { params: VectorParams } | { problem: string } {
  if (input.size === undefined) return { problem: `${field}.size is required` };
  const sizeProblem = checkPositiveInt(input.size, `${field}.size`);
  if (sizeProblem) return { problem: sizeProblem };
  if (input.distance === undefined) return { problem: `${field}.distance is required` };
  if (!isDistance(input.distance)) {
    return { problem: `${field}.distance must be one of ${DISTANCES.join(', ')}` };
  }

  const params: VectorParams = { size: input.size, distance: input.distance };
  if (input.onDisk !== undefined) params.onDisk = input.onDisk;
  return { params };
}

function convertVectors(vectors: VectorsInput): { config: VectorsConfig } | { problem: string } {
  const names = Object.keys(vectors);
  if (names.length === 0) return { problem: 'vectors must not be empty' };

  if (isSingleVectorParams(vectors)) {
    const single = convertVectorParams(vectors, 'vectors');
    return 'problem' in single ? single : { config: single.params };
  }

  const named: Record<string, VectorParams> = {};
  for (const [name, input] of Object.entries(vectors)) {
    const converted = convertVectorParams(input, `vectors.${name}`);
    if ('problem' in converted) return converted;
    named[name] = converted.params;
  }
  return { config: named };
}

function checkHnsw(hnsw: HnswConfig | undefined): string | null {
  if (!hnsw) return null;
  return firstProblem(
    checkPositiveInt(hnsw.m, 'hnswConfig.m'),
    checkPositiveInt(hnsw.efConstruct, 'hnswConfig.efConstruct'),
    checkNonNegativeInt(hnsw.fullScanThreshold, 'hnswConfig.fullScanThreshold'),
  );
}

function checkOptimizers(optimizers: OptimizersConfig | undefined): string | null {
  if (!optimizers) return null;
  const { deletedThreshold } = optimizers;
  if (deletedThreshold !== undefined && !(deletedThreshold >= 0 && deletedThreshold <= 1)) {
    return 'optimizersConfig.deletedThreshold must be between 0 and 1';
  }
  return firstProblem(
    checkNonNegativeInt(optimizers.vacuumMinVectorNumber, 'optimizersConfig.vacuumMinVectorNumber'),
    checkNonNegativeInt(optimizers.defaultSegmentNumber, 'optimizersConfig.defaultSegmentNumber'),
    checkNonNegativeInt(optimizers.indexingThreshold, 'optimizersConfig.indexingThreshold'),
    checkNonNegativeInt(optimizers.flushIntervalSec, 'optimizersConfig.flushIntervalSec'),
  );
}

function checkParams(params: CollectionParams): string | null {
  return firstProblem(
    checkPositiveInt(params.shardNumber, 'shardNumber'),
    checkPositiveInt(params.replicationFactor, 'replicationFactor'),
    checkPositiveInt(params.writeConsistencyFactor, 'writeConsistencyFactor'),
  );
}

export const convertCreateCollection: OperationConverter<CreateCollectionRequest> = (request) => {
  const nameProblem = checkName(request.collectionName, 'collectionName');
  if (nameProblem) return fail(nameProblem);

  if (request.vectors === undefined) {
    return fail(`Collection \`${request.collectionName}\` must define vectors`);
  }
  const vectors = convertVectors(request.vectors);
  if ('problem' in vectors) return fail(vectors.problem);

  const params: CollectionParams = {
    shardNumber: request.shardNumber,
    replicationFactor: request.replicationFactor,
    writeConsistencyFactor: request.writeConsistencyFactor,
    onDiskPayload: request.onDiskPayload,
  };

  const problem = firstProblem(
    checkParams(params),
    checkHnsw(request.hnswConfig),
    checkOptimizers(request.optimizersConfig),
  );
  if (problem) return fail(problem);

  return ok({
    kind: 'CreateCollection',
    collectionName: request.collectionName,
    config: {
      vectors: vectors.config,
      params,
      hnswConfig: request.hnswConfig ?? {},
      optimizersConfig: request.optimizersConfig ?? {},
    },
  });
};

export const convertUpdateCollection: OperationConverter<UpdateCollectionRequest> = (request) => {
  const nameProblem = checkName(request.collectionName, 'collectionName');
  if (nameProblem) return fail(nameProblem);

  const { params, hnswConfig, optimizersConfig } = request;
  if (!params && !hnswConfig && !optimizersConfig) {
    return fail(`Update of collection \`${request.collectionName}\` carries no changes`);
  }

  const problem = firstProblem(
    params ? checkParams(params) : null,
    checkHnsw(hnswConfig),
    checkOptimizers(optimizersConfig),
  );
  if (problem) return fail(problem);

  return ok({
    kind: 'UpdateCollection',
    collectionName: request.collectionName,
    diff: { params, hnswConfig, optimizersConfig },
  });
};

export const convertDeleteCollection: OperationConverter<DeleteCollectionRequest> = (request) => {
  const nameProblem = checkName(request.collectionName, 'collectionName');
  if (nameProblem) return fail(nameProblem);
  return ok({ kind: 'DeleteCollection', collectionName: request.collectionName });
};

function convertAliasAction(
  action: AliasActionInput,
  index: number,
): { operation: AliasOperation } | { problem: string } {
  const { createAlias, deleteAlias, renameAlias } = action;
  const present = [createAlias, deleteAlias, renameAlias].filter((member) => member !== undefined);
  if (present.length !== 1) return { problem: `Malformed AliasOperation type at actions[${index}]` };

  const at = `actions[${index}]`;
  if (createAlias) {
    const problem = firstProblem(
      checkName(createAlias.collectionName, `${at}.createAlias.collectionName`),
      checkName(createAlias.aliasName, `${at}.createAlias.aliasName`),
    );
    if (problem || !createAlias.collectionName || !createAlias.aliasName) {
      return { problem: problem ?? `${at}.createAlias is incomplete` };
    }
    return {
      operation: {
        kind: 'CreateAlias',
        collectionName: createAlias.collectionName,
        aliasName: createAlias.aliasName,
      },
    };
  }

  if (deleteAlias) {
    const problem = checkName(deleteAlias.aliasName, `${at}.deleteAlias.aliasName`);
    if (problem || !deleteAlias.aliasName) {
      return { problem: problem ?? `${at}.deleteAlias is incomplete` };
    }
    return { operation: { kind: 'DeleteAlias', aliasName: deleteAlias.aliasName } };
  }

  const rename = renameAlias ?? {};
  const problem = firstProblem(
    checkName(rename.oldAliasName, `${at}.renameAlias.oldAliasName`),
    checkName(rename.newAliasName, `${at}.renameAlias.newAliasName`),
  );
  if (problem || !rename.oldAliasName || !rename.newAliasName) {
    return { problem: problem ?? `${at}.renameAlias is incomplete` };
  }
  if (rename.oldAliasName === rename.newAliasName) {
    return { problem: `${at}.renameAlias must change the alias name` };
  }
  return {
    operation: {
      kind: 'RenameAlias',
      oldAliasName: rename.oldAliasName,
      newAliasName: rename.newAliasName,
    },
  };
}

export const convertChangeAliases: OperationConverter<ChangeAliasesRequest> = (request) => {
  const actions: AliasOperation[] = [];
  for (const [index, action] of request.actions.entries()) {
    const converted = convertAliasAction(action, index);
    if ('problem' in converted) return fail(converted.problem);
    actions.push(converted.operation);
  }
  return ok({ kind: 'ChangeAliases', actions });
};
