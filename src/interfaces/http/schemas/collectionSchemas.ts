/**
 * Envelope Schemas for the Collections API
 * Layer: Interfaces (HTTP)
 *
 * These check JSON types only. Required-ness of sub-fields and value ranges
 * stay optional here so the operation converters can report them with their
 * own messages.
 *
 * Vector params use a strict object: otherwise a map of named vectors would
 * match the single-params branch with every key stripped.
 */
import { z } from 'zod/v4';

export const collectionParamsSchema = z.object({
  name: z.string(),
});

export const timeoutQuerySchema = z.object({
  /** Whole seconds the caller is willing to wait for the operation. `?timeout=` means none. */
  timeout: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().min(0).optional(),
  ),
});

const hnswConfigSchema = z.object({
  m: z.number().optional(),
  efConstruct: z.number().optional(),
  fullScanThreshold: z.number().optional(),
  onDisk: z.boolean().optional(),
});

const optimizersConfigSchema = z.object({
  deletedThreshold: z.number().optional(),
  vacuumMinVectorNumber: z.number().optional(),
  defaultSegmentNumber: z.number().optional(),
  indexingThreshold: z.number().optional(),
  flushIntervalSec: z.number().optional(),
});

const vectorParamsSchema = z.strictObject({
  size: z.number().optional(),
  distance: z.string().optional(),
  onDisk: z.boolean().optional(),
});

export const createCollectionBodySchema = z
  .object({
    vectors: z.union([vectorParamsSchema, z.record(z.string(), vectorParamsSchema)]).optional(),
    shardNumber: z.number().optional(),
    replicationFactor: z.number().optional(),
    writeConsistencyFactor: z.number().optional(),
    onDiskPayload: z.boolean().optional(),
    hnswConfig: hnswConfigSchema.optional(),
    optimizersConfig: optimizersConfigSchema.optional(),
  })
  .default({});

export const updateCollectionBodySchema = z
  .object({
    params: z
      .object({
        replicationFactor: z.number().optional(),
        writeConsistencyFactor: z.number().optional(),
        onDiskPayload: z.boolean().optional(),
      })
      .optional(),
    hnswConfig: hnswConfigSchema.optional(),
    optimizersConfig: optimizersConfigSchema.optional(),
  })
  .default({});

const aliasActionSchema = z.object({
  createAlias: z
    .object({ collectionName: z.string().optional(), aliasName: z.string().optional() })
    .optional(),
  deleteAlias: z.object({ aliasName: z.string().optional() }).optional(),
  renameAlias: z
    .object({ oldAliasName: z.string().optional(), newAliasName: z.string().optional() })
    .optional(),
});

export const changeAliasesBodySchema = z.object({
  actions: z.array(aliasActionSchema),
});
