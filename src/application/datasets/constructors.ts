import type { Dataset } from '../../domain/ports/Dataset.js';
import type { NamedRow, PositionalRow, RecordDecoder } from '../../domain/ports/RecordDecoder.js';
import type { Source } from '../../domain/model/Source.js';
import type { DatasetOptions } from './FetchedDataset.js';
import { FetchedDataset } from './FetchedDataset.js';
import { CsvParser, HeaderedCsvParser } from '../../infrastructure/parsers/CsvParser.js';
import { JsonParser } from '../../infrastructure/parsers/JsonParser.js';

export interface HeaderedDatasetOptions extends DatasetOptions {
  /** Column separator, a single character. Default: `','`. */
  readonly separator?: string;
}

/** Headerless delimited text, decoded positionally. */
export function fromDelimited<T>(
  source: Source,
  decoder: RecordDecoder<PositionalRow, T>,
  options?: DatasetOptions,
): Dataset<T> {
  return new FetchedDataset(source, new CsvParser(decoder), options);
}

/** Delimited text with a header row, decoded by column name. */
export function fromDelimitedHeadered<T>(
  source: Source,
  decoder: RecordDecoder<NamedRow, T>,
  options?: HeaderedDatasetOptions,
): Dataset<T> {
  return new FetchedDataset(source, new HeaderedCsvParser(decoder, { delimiter: options?.separator }), options);
}

/** A JSON array of records, decoded as a whole. */
export function fromStructuredDocument<T>(
  source: Source,
  decoder: RecordDecoder<unknown, T>,
  options?: DatasetOptions,
): Dataset<T> {
  return new FetchedDataset(source, new JsonParser(decoder), options);
}
