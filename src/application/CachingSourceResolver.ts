import type { Source, UrlSource } from '../domain/model/Source.js';
import type { SourceResolver } from '../domain/ports/SourceResolver.js';
import type { CacheStore } from '../domain/ports/CacheStore.js';
import type { HttpClient } from '../domain/ports/HttpClient.js';
import { FileCacheStore } from '../infrastructure/cache/FileCacheStore.js';
import { FetchHttpClient } from '../infrastructure/http/FetchHttpClient.js';
import { EventBus } from './EventBus.js';

export interface CachingSourceResolverOptions {
  /** Client used on cache misses. Default: `FetchHttpClient` with its default timeout. */
  readonly httpClient?: HttpClient;
  /** Builds the cache store for a directory. Default: `FileCacheStore`. */
  readonly cacheStoreFactory?: (cacheDirectory: string) => CacheStore;
  readonly eventBus?: EventBus;
}

/**
 * Resolves sources through a local cache: a hit is read from disk, a miss is
 * fetched once and written to disk before being returned. Cached entries are
 * never revalidated against the remote source.
 */
export class CachingSourceResolver implements SourceResolver {
  private readonly httpClient: HttpClient;
  private readonly cacheStoreFactory: (cacheDirectory: string) => CacheStore;
  private readonly eventBus: EventBus;

  constructor(options?: CachingSourceResolverOptions) {
    this.httpClient = options?.httpClient ?? new FetchHttpClient();
    this.cacheStoreFactory = options?.cacheStoreFactory ?? ((directory) => new FileCacheStore({ directory }));
    this.eventBus = options?.eventBus ?? new EventBus();
  }

  async resolve(cacheDirectory: string, source: Source): Promise<Buffer> {
    const cache = this.cacheStoreFactory(cacheDirectory);
    switch (source.kind) {
      case 'url':
        return this.resolveUrl(cache, source);
    }
  }

  private async resolveUrl(cache: CacheStore, source: UrlSource): Promise<Buffer> {
    const path = cache.pathFor(source.url);

    if (await cache.exists(path)) {
      const data = await cache.read(path);
      this.eventBus.emit({
        type: 'cache:hit',
        identifier: source.url,
        path,
        bytes: data.length,
        timestamp: Date.now(),
      });
      return data;
    }

    this.eventBus.emit({ type: 'cache:miss', identifier: source.url, path, timestamp: Date.now() });

    const startedAt = Date.now();
    const data = await this.httpClient.get(source.url);
    await cache.write(path, data);

    this.eventBus.emit({
      type: 'source:fetched',
      url: source.url,
      path,
      bytes: data.length,
      durationMs: Date.now() - startedAt,
      timestamp: Date.now(),
    });
    return data;
  }
}
