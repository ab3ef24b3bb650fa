/**
 * Collection Meta Operations
 * Layer: Domain
 *
 * The coordinator's unit of work. Every mutating request converts into
 * exactly one variant; the coordinator switches on `kind`.
 */
import type { CollectionConfig, CollectionConfigDiff } from '@domain/entities/Collection';

export type AliasOperation =
  | { kind: 'CreateAlias'; collectionName: string; aliasName: string }
  | { kind: 'DeleteAlias'; aliasName: string }
  | { kind: 'RenameAlias'; oldAliasName: string; newAliasName: string };

export type CollectionMetaOperation =
  | { kind: 'CreateCollection'; collectionName: string; config: CollectionConfig }
  | { kind: 'UpdateCollection'; collectionName: string; diff: CollectionConfigDiff }
  | { kind: 'DeleteCollection'; collectionName: string }
  | { kind: 'ChangeAliases'; actions: AliasOperation[] };

export type CollectionMetaOperationKind = CollectionMetaOperation['kind'];
