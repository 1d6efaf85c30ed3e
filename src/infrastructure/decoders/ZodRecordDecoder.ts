import type { z } from 'zod';
import type { RecordDecoder } from '../../domain/ports/RecordDecoder.js';
import type { DecodeIssue, DecodeResult } from '../../domain/model/DecodeResult.js';
import { decoded, decodeFailed } from '../../domain/model/DecodeResult.js';

/** Decoder backed by a zod schema. The record type is the schema's output type. */
export class ZodRecordDecoder<S extends z.ZodTypeAny> implements RecordDecoder<unknown, z.output<S>> {
  constructor(private readonly schema: S) {}

  decode(input: unknown): DecodeResult<z.output<S>> {
    const result = this.schema.safeParse(input);
    if (result.success) {
      return decoded<z.output<S>>(result.data);
    }
    return decodeFailed<z.output<S>>(result.error.issues.map(toDecodeIssue));
  }
}

export function zodDecoder<S extends z.ZodTypeAny>(schema: S): ZodRecordDecoder<S> {
  return new ZodRecordDecoder(schema);
}

function toDecodeIssue(issue: z.ZodIssue): DecodeIssue {
  return {
    path: issue.path.map(String).join('.'),
    message: issue.message,
  };
}
