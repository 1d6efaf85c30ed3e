import Papa from 'papaparse';
import type { ParseError as PapaParseError } from 'papaparse';
import type { FormatParser, ParseResult } from '../../domain/ports/FormatParser.js';
import type { NamedRow, PositionalRow, RecordDecoder } from '../../domain/ports/RecordDecoder.js';
import type { DecodeIssue } from '../../domain/model/DecodeResult.js';
import { formatIssues } from '../../domain/model/DecodeResult.js';
import { parsed, parseFailed } from '../../domain/ports/FormatParser.js';
import { ParseError } from '../../domain/errors/DatasetError.js';
import { decodeRecords } from './decodeRecords.js';
import { decodeUtf8 } from './decodeText.js';

export interface CsvParserOptions {
  /** Field separator, a single character. Default: `','`. */
  readonly delimiter?: string;
}

const FORBIDDEN_DELIMITERS = new Set(['"', '\r', '\n']);

function checkDelimiter(parserName: string, delimiter: string): string {
  if (delimiter.length !== 1 || FORBIDDEN_DELIMITERS.has(delimiter)) {
    throw new Error(`${parserName}: delimiter must be a single character other than a quote or line break`);
  }
  return delimiter;
}

function toIssue(error: PapaParseError): DecodeIssue {
  return {
    path: typeof error.row === 'number' ? `row ${String(error.row + 1)}` : '',
    message: error.message,
  };
}

function parseDelimited<Row, T>(
  parserName: string,
  data: Buffer,
  config: { readonly delimiter: string; readonly header: boolean },
  decoder: RecordDecoder<Row, T>,
): ParseResult<T> {
  const text = decodeUtf8(data);
  if (!text.ok) {
    return parseFailed(new ParseError(`${parserName}: ${formatIssues(text.issues)}`, { issues: text.issues }));
  }

  const result = Papa.parse<Row>(text.value, {
    header: config.header,
    delimiter: config.delimiter,
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  if (result.errors.length > 0) {
    const issues = result.errors.map(toIssue);
    return parseFailed(new ParseError(`${parserName}: malformed input: ${formatIssues(issues)}`, { issues }));
  }

  if (config.header && (result.meta.fields ?? []).length === 0) {
    return parseFailed(new ParseError(`${parserName}: missing header row`));
  }

  const records = decodeRecords(result.data, decoder);
  if (!records.ok) {
    return parseFailed(
      new ParseError(`${parserName}: ${formatIssues(records.issues)}`, { issues: records.issues }),
    );
  }
  return parsed(records.value);
}

/** Headerless delimited text. Each row reaches the decoder as positional string fields. */
export class CsvParser<T> implements FormatParser<T> {
  private readonly delimiter: string;

  constructor(
    private readonly decoder: RecordDecoder<PositionalRow, T>,
    options?: CsvParserOptions,
  ) {
    this.delimiter = checkDelimiter('CsvParser', options?.delimiter ?? ',');
  }

  parse(data: Buffer): ParseResult<T> {
    return parseDelimited<string[], T>('CsvParser', data, { delimiter: this.delimiter, header: false }, this.decoder);
  }
}

/** Delimited text whose first row names the columns. Each row reaches the decoder keyed by column name. */
export class HeaderedCsvParser<T> implements FormatParser<T> {
  private readonly delimiter: string;

  constructor(
    private readonly decoder: RecordDecoder<NamedRow, T>,
    options?: CsvParserOptions,
  ) {
    this.delimiter = checkDelimiter('HeaderedCsvParser', options?.delimiter ?? ',');
  }

  parse(data: Buffer): ParseResult<T> {
    return parseDelimited<Record<string, string>, T>(
      'HeaderedCsvParser',
      data,
      { delimiter: this.delimiter, header: true },
      this.decoder,
    );
  }
}
