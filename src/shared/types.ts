/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Response shapes the collections service returns and the controllers send
 * as JSON. Every response carries `time`: seconds (floating point) spent in
 * the coordinator call, measured on a monotonic clock.
 */
import type {
  AliasDescription,
  CollectionDescription,
  CollectionInfo,
} from '@domain/entities/Collection';

/** Wait budget handed to the coordinator, in whole seconds. */
export interface Duration {
  seconds: number;
}

export interface TimedResponse {
  time: number;
}

export interface CollectionOperationResponse extends TimedResponse {
  /** Whether the coordinator reports the operation as applied. */
  result: boolean;
}

export interface GetCollectionInfoResponse extends TimedResponse {
  result: CollectionInfo;
}

export interface ListCollectionsResponse extends TimedResponse {
  collections: CollectionDescription[];
}

export interface ListAliasesResponse extends TimedResponse {
  aliases: AliasDescription[];
}
