import { z } from 'zod';
import type { FieldReader } from '../../domain/services/FieldReaders.js';
import { readField, readFieldAfterDashToCamel } from '../../domain/services/FieldReaders.js';

function readingSchema<T>(read: (text: string) => T) {
  return z.string().transform((text, ctx): T => {
    try {
      return read(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    }
  });
}

/**
 * String field decoded with `readField`. An unreadable value fails with the message `unknown`;
 * a reader that throws fails the field with the thrown message.
 */
export function fieldSchema<T>(reader: FieldReader<T>) {
  return readingSchema((text) => readField(text, reader));
}

/** Like `fieldSchema`, after turning dashes into camel case (`iris-setosa` reads as `irisSetosa`). */
export function dashedFieldSchema<T>(reader: FieldReader<T>) {
  return readingSchema((text) => readFieldAfterDashToCamel(text, reader));
}
