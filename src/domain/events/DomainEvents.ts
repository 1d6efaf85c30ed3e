import type { DatasetErrorCode } from '../errors/DatasetError.js';

/** Emitted when a source is served from the local cache. */
export interface CacheHitEvent {
  readonly type: 'cache:hit';
  readonly identifier: string;
  readonly path: string;
  readonly bytes: number;
  readonly timestamp: number;
}

/** Emitted when a source has no cache entry and must be fetched. */
export interface CacheMissEvent {
  readonly type: 'cache:miss';
  readonly identifier: string;
  readonly path: string;
  readonly timestamp: number;
}

/** Emitted after a remote source was downloaded and written to the cache. */
export interface SourceFetchedEvent {
  readonly type: 'source:fetched';
  readonly url: string;
  readonly path: string;
  readonly bytes: number;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when `getDataset()` starts a load. */
export interface DatasetLoadingEvent {
  readonly type: 'dataset:loading';
  readonly identifier: string;
  readonly cacheDirectory: string;
  readonly timestamp: number;
}

/** Emitted when a load produced its records. */
export interface DatasetLoadedEvent {
  readonly type: 'dataset:loaded';
  readonly identifier: string;
  readonly recordCount: number;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when a load failed. The error is rethrown to the caller afterwards. */
export interface DatasetFailedEvent {
  readonly type: 'dataset:failed';
  readonly identifier: string;
  readonly error: string;
  readonly code?: DatasetErrorCode;
  readonly timestamp: number;
}

export type DomainEvent =
  | CacheHitEvent
  | CacheMissEvent
  | SourceFetchedEvent
  | DatasetLoadingEvent
  | DatasetLoadedEvent
  | DatasetFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
