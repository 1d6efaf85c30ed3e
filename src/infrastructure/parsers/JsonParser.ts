import type { FormatParser, ParseResult } from '../../domain/ports/FormatParser.js';
import type { RecordDecoder } from '../../domain/ports/RecordDecoder.js';
import { parsed, parseFailed } from '../../domain/ports/FormatParser.js';
import { ParseError } from '../../domain/errors/DatasetError.js';
import { decodeRecords } from './decodeRecords.js';
import { decodeUtf8 } from './decodeText.js';

const FAILURE_MESSAGE = 'failed to parse json';

/**
 * Structured-document parser: the whole payload is one JSON array whose elements
 * are decoded into records. Decoding is all-or-nothing.
 */
export class JsonParser<T> implements FormatParser<T> {
  constructor(private readonly decoder: RecordDecoder<unknown, T>) {}

  parse(data: Buffer): ParseResult<T> {
    const text = decodeUtf8(data);
    if (!text.ok) {
      return parseFailed(new ParseError(FAILURE_MESSAGE, { issues: text.issues }));
    }

    let document: unknown;
    try {
      document = JSON.parse(text.value);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return parseFailed(new ParseError(FAILURE_MESSAGE, { issues: [{ path: '', message }], cause: error }));
    }

    if (!Array.isArray(document)) {
      return parseFailed(
        new ParseError(FAILURE_MESSAGE, { issues: [{ path: '', message: 'expected a JSON array of records' }] }),
      );
    }

    const records = decodeRecords<unknown, T>(document, this.decoder);
    if (!records.ok) {
      return parseFailed(new ParseError(FAILURE_MESSAGE, { issues: records.issues }));
    }
    return parsed(records.value);
  }
}
