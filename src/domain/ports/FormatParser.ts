import type { ParseError } from '../errors/DatasetError.js';

export type ParseResult<T> =
  | { readonly ok: true; readonly records: readonly T[] }
  | { readonly ok: false; readonly error: ParseError };

/** Converts a whole payload into records, or fails without returning any. */
export interface FormatParser<T> {
  parse(data: Buffer): ParseResult<T>;
}

/** Byte-level transform applied to raw content before parsing. */
export type Preprocessor = (data: Buffer) => Buffer;

export function parsed<T>(records: readonly T[]): ParseResult<T> {
  return { ok: true, records };
}

export function parseFailed<T>(error: ParseError): ParseResult<T> {
  return { ok: false, error };
}
