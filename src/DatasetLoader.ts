import type { Dataset } from './domain/ports/Dataset.js';
import type { HttpClient } from './domain/ports/HttpClient.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { sourceIdentifier } from './domain/model/Source.js';
import { isDatasetError } from './domain/errors/DatasetError.js';
import { EventBus } from './application/EventBus.js';
import { CachingSourceResolver } from './application/CachingSourceResolver.js';
import { defaultCacheDirectory } from './infrastructure/cache/FileCacheStore.js';
import { FetchHttpClient } from './infrastructure/http/FetchHttpClient.js';

export interface DatasetLoaderConfig {
  /** Where fetched sources are cached. Default: `{os.tmpdir()}/haskds`. */
  readonly cacheDirectory?: string;
  /**
   * Network timeout in milliseconds for the default HTTP client. Default: `30000`.
   * Not accepted together with `httpClient`; configure the supplied client instead.
   */
  readonly timeout?: number;
  /** Replaces the default fetch-based client. */
  readonly httpClient?: HttpClient;
}

/**
 * Entry point for loading datasets.
 *
 * Every `getDataset()` call resolves the source through the local cache, so only
 * the first load of a URL reaches the network.
 */
export class DatasetLoader {
  readonly cacheDirectory: string;
  private readonly eventBus: EventBus;
  private readonly resolver: CachingSourceResolver;

  constructor(config?: DatasetLoaderConfig) {
    if (config?.httpClient !== undefined && config.timeout !== undefined) {
      throw new Error('DatasetLoader: timeout applies only to the default HTTP client; configure it on httpClient');
    }
    this.cacheDirectory = config?.cacheDirectory ?? defaultCacheDirectory();
    this.eventBus = new EventBus();
    this.resolver = new CachingSourceResolver({
      httpClient: config?.httpClient ?? new FetchHttpClient({ timeout: config?.timeout }),
      eventBus: this.eventBus,
    });
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  async getDataset<T>(dataset: Dataset<T>): Promise<readonly T[]> {
    const identifier = sourceIdentifier(dataset.source);
    const startedAt = Date.now();
    this.eventBus.emit({
      type: 'dataset:loading',
      identifier,
      cacheDirectory: this.cacheDirectory,
      timestamp: startedAt,
    });

    try {
      const records = await dataset.load(this.cacheDirectory, this.resolver);
      this.eventBus.emit({
        type: 'dataset:loaded',
        identifier,
        recordCount: records.length,
        durationMs: Date.now() - startedAt,
        timestamp: Date.now(),
      });
      return records;
    } catch (error) {
      this.eventBus.emit({
        type: 'dataset:failed',
        identifier,
        error: error instanceof Error ? error.message : String(error),
        code: isDatasetError(error) ? error.code : undefined,
        timestamp: Date.now(),
      });
      throw error;
    }
  }
}

/** Load a dataset, caching its source under `{os.tmpdir()}/haskds` unless configured otherwise. */
export function getDataset<T>(dataset: Dataset<T>, config?: DatasetLoaderConfig): Promise<readonly T[]> {
  return new DatasetLoader(config).getDataset(dataset);
}
