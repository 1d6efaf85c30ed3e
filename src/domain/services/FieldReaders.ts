import { FieldDecodeError } from '../errors/DatasetError.js';

/** Canonical textual parse of one scalar. Returns `undefined` when the text is not a valid value. */
export type FieldReader<T> = (text: string) => T | undefined;

const INTEGER_PATTERN = /^-?\d+$/;

export const intReader: FieldReader<number> = (text) => {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return undefined;
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : undefined;
};

export const numberReader: FieldReader<number> = (text) => {
  const trimmed = text.trim();
  if (trimmed === '') return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
};

export const booleanReader: FieldReader<boolean> = (text) => {
  switch (text.trim().toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      return undefined;
  }
};

/** Reader for a closed set of names, matched exactly. */
export function enumReader<V extends string>(values: readonly V[]): FieldReader<V> {
  return (text) => values.find((value) => value === text);
}

/** Turn every `-x` into `X`, e.g. `iris-setosa` into `irisSetosa`. */
export function dashesToCamelCase(text: string): string {
  return text.replace(/-([\s\S])/g, (_match, next: string) => next.toUpperCase());
}

/** @throws FieldDecodeError with message `unknown` when the reader rejects the text. */
export function readField<T>(text: string, reader: FieldReader<T>): T {
  const value = reader(text);
  if (value === undefined) {
    throw new FieldDecodeError(text);
  }
  return value;
}

export function readFieldAfterDashToCamel<T>(text: string, reader: FieldReader<T>): T {
  return readField(dashesToCamelCase(text), reader);
}
