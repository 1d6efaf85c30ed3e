import type { DecodeResult } from '../model/DecodeResult.js';

/**
 * Turns one raw record into a typed value.
 *
 * `I` is what the parser hands over: positional fields (`readonly string[]`) for
 * headerless delimited text, named fields (`Readonly<Record<string, string>>`)
 * for headered delimited text, and an arbitrary JSON value for documents.
 */
export interface RecordDecoder<I, T> {
  decode(input: I): DecodeResult<T>;
}

export type PositionalRow = readonly string[];

export type NamedRow = Readonly<Record<string, string>>;
