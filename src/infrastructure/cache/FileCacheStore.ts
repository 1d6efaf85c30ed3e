import { createHash, randomUUID } from 'node:crypto';
import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CacheStore } from '../../domain/ports/CacheStore.js';
import { IOError } from '../../domain/errors/DatasetError.js';

/**
 * Cache key format: the first 16 hex digits (64 bits) of the SHA-256 digest of the
 * UTF-8 identifier. Changing it orphans every existing cache entry.
 */
export const CACHE_KEY_ALGORITHM = 'sha256-64';

const CACHE_FILE_PREFIX = 'ds';

/** Name of the cache directory created under the system temporary directory. */
export const DEFAULT_CACHE_SUBDIRECTORY = 'haskds';

export function defaultCacheDirectory(): string {
  return join(tmpdir(), DEFAULT_CACHE_SUBDIRECTORY);
}

export function cacheKey(identifier: string): string {
  return createHash('sha256').update(identifier, 'utf-8').digest('hex').slice(0, 16);
}

/** `{cacheDirectory}/ds{key}`: one flat file per source. */
export function resolveCachePath(cacheDirectory: string, identifier: string): string {
  return join(cacheDirectory, `${CACHE_FILE_PREFIX}${cacheKey(identifier)}`);
}

export interface FileCacheStoreOptions {
  /** Directory holding the cache entries. Created on first write. */
  readonly directory: string;
}

/** Cache store keeping each fetched source as a single file on disk. Node.js only. */
export class FileCacheStore implements CacheStore {
  private readonly directory: string;

  constructor(options: FileCacheStoreOptions) {
    this.directory = options.directory;
  }

  pathFor(identifier: string): string {
    return resolveCachePath(this.directory, identifier);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async read(path: string): Promise<Buffer> {
    try {
      return await readFile(path);
    } catch (error) {
      throw new IOError(path, `FileCacheStore: cannot read ${path}: ${describe(error)}`, { cause: error });
    }
  }

  /** Writes to a temporary file beside the entry and renames it into place, so readers never see a partial entry. */
  async write(path: string, data: Buffer): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new IOError(path, `FileCacheStore: cannot write ${path}: ${describe(error)}`, { cause: error });
    }

    const tempPath = `${path}.${String(process.pid)}.${randomUUID()}.tmp`;
    try {
      await writeFile(tempPath, data);
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new IOError(path, `FileCacheStore: cannot write ${path}: ${describe(error)}`, { cause: error });
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
