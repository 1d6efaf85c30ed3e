import type { Source } from '../model/Source.js';
import type { ParseResult } from './FormatParser.js';
import type { SourceResolver } from './SourceResolver.js';

/**
 * A deferred load of typed records.
 *
 * A dataset holds only its declaration (source, preprocessing, decoder). Every
 * resource a load needs (cache directory, connections, file handles) is acquired
 * per call to `load()`.
 */
export interface Dataset<T> {
  readonly source: Source;
  /**
   * Fetch (or read from cache), preprocess and parse the source.
   * Rejects with `FetchError`, `IOError` or `ParseError`.
   */
  load(cacheDirectory: string, resolver?: SourceResolver): Promise<readonly T[]>;
  /** Preprocess and parse raw content without touching the network or the cache. */
  parse(raw: Buffer): ParseResult<T>;
}
