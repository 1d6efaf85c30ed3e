import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { zodDecoder } from '../../../src/infrastructure/decoders/ZodRecordDecoder.js';
import { fieldSchema, dashedFieldSchema } from '../../../src/infrastructure/decoders/fieldSchemas.js';
import { enumReader, intReader, numberReader } from '../../../src/domain/services/FieldReaders.js';

describe('ZodRecordDecoder', () => {
  it('should return the schema output on success', () => {
    const decoder = zodDecoder(z.object({ id: z.number() }));

    expect(decoder.decode({ id: 7 })).toEqual({ ok: true, value: { id: 7 } });
  });

  it('should turn zod issues into decode issues with dotted paths', () => {
    const decoder = zodDecoder(z.object({ point: z.object({ x: z.number() }) }));

    expect(decoder.decode({ point: { x: 'left' } })).toEqual({
      ok: false,
      issues: [{ path: 'point.x', message: 'Expected number, received string' }],
    });
  });

  it('should apply transforms to build the record type', () => {
    const int = fieldSchema(intReader);
    const decoder = zodDecoder(z.tuple([int, fieldSchema(numberReader)]).transform(([id, score]) => ({ id, score })));

    expect(decoder.decode(['3', '0.25'])).toEqual({ ok: true, value: { id: 3, score: 0.25 } });
  });
});

describe('fieldSchema', () => {
  it('should report an unreadable value as unknown', () => {
    const result = fieldSchema(intReader).safeParse('many');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe('unknown');
  });

  it('should reject non-string input', () => {
    expect(fieldSchema(intReader).safeParse(5).success).toBe(false);
  });
});

describe('dashedFieldSchema', () => {
  const species = dashedFieldSchema(enumReader(['irisSetosa', 'irisVersicolor', 'irisVirginica']));

  it('should read dashed names as camel case', () => {
    expect(species.parse('iris-virginica')).toBe('irisVirginica');
  });

  it('should report names outside the set as unknown', () => {
    const result = species.safeParse('iris-other');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe('unknown');
  });
});
