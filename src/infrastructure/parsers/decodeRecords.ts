import type { RecordDecoder } from '../../domain/ports/RecordDecoder.js';
import type { DecodeResult } from '../../domain/model/DecodeResult.js';
import { decoded, decodeFailed, prefixIssues } from '../../domain/model/DecodeResult.js';

// A decoder that throws fails the record like any other decode failure.
function decodeRow<I, T>(row: I, decoder: RecordDecoder<I, T>): DecodeResult<T> {
  try {
    return decoder.decode(row);
  } catch (error) {
    return decodeFailed([{ path: '', message: error instanceof Error ? error.message : String(error) }]);
  }
}

/** Decode every row, stopping at the first failure. Issue paths are prefixed with the 1-based record number. */
export function decodeRecords<I, T>(rows: readonly I[], decoder: RecordDecoder<I, T>): DecodeResult<T[]> {
  const records: T[] = [];

  for (const [index, row] of rows.entries()) {
    const result = decodeRow(row, decoder);
    if (!result.ok) {
      return decodeFailed(prefixIssues(`record ${String(index + 1)}`, result.issues));
    }
    records.push(result.value);
  }

  return decoded(records);
}
