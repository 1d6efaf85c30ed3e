import type { Source } from '../model/Source.js';

/** Port for turning a source into its raw bytes, going through the cache in `cacheDirectory`. */
export interface SourceResolver {
  resolve(cacheDirectory: string, source: Source): Promise<Buffer>;
}
