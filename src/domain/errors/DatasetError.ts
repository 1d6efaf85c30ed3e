import type { DecodeIssue } from '../model/DecodeResult.js';

export type DatasetErrorCode = 'FETCH_FAILED' | 'IO_FAILED' | 'PARSE_FAILED' | 'FIELD_DECODE_FAILED';

/** Base class of every failure raised while loading a dataset. */
export abstract class DatasetError extends Error {
  abstract readonly code: DatasetErrorCode;

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
  }
}

/** Network failure while fetching a remote source. Never retried. */
export class FetchError extends DatasetError {
  readonly code = 'FETCH_FAILED';
  /** HTTP status when the server answered with a non-2xx response. */
  readonly status: number | undefined;

  constructor(
    readonly url: string,
    message: string,
    options?: { readonly status?: number; readonly cause?: unknown },
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

/** Local filesystem failure while reading or writing the cache. */
export class IOError extends DatasetError {
  readonly code = 'IO_FAILED';

  constructor(
    readonly path: string,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Malformed payload, failed preprocessing, or a record that does not match its decoder. */
export class ParseError extends DatasetError {
  readonly code = 'PARSE_FAILED';
  readonly issues: readonly DecodeIssue[];

  constructor(message: string, options?: { readonly issues?: readonly DecodeIssue[]; readonly cause?: unknown }) {
    super(message, options);
    this.issues = options?.issues ?? [];
  }
}

/** A single scalar field could not be read. */
export class FieldDecodeError extends DatasetError {
  readonly code = 'FIELD_DECODE_FAILED';

  constructor(
    readonly text: string,
    message = 'unknown',
  ) {
    super(message);
  }
}

export function isDatasetError(error: unknown): error is DatasetError {
  return error instanceof DatasetError;
}
