/**
 * Port for the local cache of fetched sources.
 *
 * Entries are flat files keyed by a hash of the source identifier. There is no
 * manifest, no expiry and no locking: concurrent writers of the same entry race
 * and the last write wins.
 */
export interface CacheStore {
  /** Deterministic file path for an identifier (a URL). */
  pathFor(identifier: string): string;
  exists(path: string): Promise<boolean>;
  /** Read a cached entry. Rejects with `IOError` when missing or unreadable. */
  read(path: string): Promise<Buffer>;
  /** Write an entry, creating the cache directory if needed. Rejects with `IOError`. */
  write(path: string, data: Buffer): Promise<void>;
}
