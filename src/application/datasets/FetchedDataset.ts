import type { Dataset } from '../../domain/ports/Dataset.js';
import type { FormatParser, ParseResult, Preprocessor } from '../../domain/ports/FormatParser.js';
import type { SourceResolver } from '../../domain/ports/SourceResolver.js';
import type { Source } from '../../domain/model/Source.js';
import { parseFailed } from '../../domain/ports/FormatParser.js';
import { sourceIdentifier } from '../../domain/model/Source.js';
import { ParseError } from '../../domain/errors/DatasetError.js';
import { CachingSourceResolver } from '../CachingSourceResolver.js';

export interface DatasetOptions {
  /** Transform applied to the raw bytes before parsing. Default: identity. */
  readonly preprocess?: Preprocessor;
}

const identity: Preprocessor = (data) => data;

/** Dataset fetched from a source, preprocessed, then handed to a format parser. */
export class FetchedDataset<T> implements Dataset<T> {
  private readonly preprocess: Preprocessor;

  constructor(
    readonly source: Source,
    private readonly parser: FormatParser<T>,
    options?: DatasetOptions,
  ) {
    this.preprocess = options?.preprocess ?? identity;
  }

  async load(cacheDirectory: string, resolver?: SourceResolver): Promise<readonly T[]> {
    const raw = await (resolver ?? new CachingSourceResolver()).resolve(cacheDirectory, this.source);
    const result = this.parse(raw);
    if (!result.ok) {
      throw result.error;
    }
    return result.records;
  }

  parse(raw: Buffer): ParseResult<T> {
    let content: Buffer;
    try {
      content = this.preprocess(raw);
    } catch (error) {
      if (error instanceof ParseError) return parseFailed(error);
      const reason = error instanceof Error ? error.message : String(error);
      return parseFailed(
        new ParseError(`preprocessing ${sourceIdentifier(this.source)} failed: ${reason}`, { cause: error }),
      );
    }
    return this.parser.parse(content);
  }
}
