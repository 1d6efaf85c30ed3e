import { describe, it, expect } from 'vitest';
import {
  dashesToCamelCase,
  readField,
  readFieldAfterDashToCamel,
  intReader,
  numberReader,
  booleanReader,
  enumReader,
} from '../../../src/domain/services/FieldReaders.js';
import { FieldDecodeError } from '../../../src/domain/errors/DatasetError.js';

describe('dashesToCamelCase', () => {
  it('should upper-case the character after each dash', () => {
    expect(dashesToCamelCase('foo-bar-baz')).toBe('fooBarBaz');
  });

  it('should leave text without dashes unchanged', () => {
    expect(dashesToCamelCase('plain')).toBe('plain');
  });

  it('should keep a trailing dash', () => {
    expect(dashesToCamelCase('trailing-')).toBe('trailing-');
  });

  it('should consume dashes in pairs', () => {
    expect(dashesToCamelCase('a--b')).toBe('a-b');
  });
});

describe('field readers', () => {
  it('should read integers', () => {
    expect(intReader('42')).toBe(42);
    expect(intReader(' -7 ')).toBe(-7);
    expect(intReader('4.2')).toBeUndefined();
    expect(intReader('')).toBeUndefined();
  });

  it('should read finite numbers', () => {
    expect(numberReader('3.5')).toBe(3.5);
    expect(numberReader('.5')).toBe(0.5);
    expect(numberReader('1e3')).toBe(1000);
    expect(numberReader('abc')).toBeUndefined();
    expect(numberReader('  ')).toBeUndefined();
    expect(numberReader('Infinity')).toBeUndefined();
  });

  it('should read booleans case-insensitively', () => {
    expect(booleanReader('true')).toBe(true);
    expect(booleanReader('FALSE')).toBe(false);
    expect(booleanReader('yes')).toBeUndefined();
  });

  it('should read members of a closed set', () => {
    const species = enumReader(['irisSetosa', 'irisVersicolor']);
    expect(species('irisSetosa')).toBe('irisSetosa');
    expect(species('irisVirginica')).toBeUndefined();
  });
});

describe('readField', () => {
  it('should return the value read', () => {
    expect(readField('12', intReader)).toBe(12);
  });

  it('should throw FieldDecodeError with message unknown when unreadable', () => {
    expect(() => readField('twelve', intReader)).toThrow(FieldDecodeError);
    expect(() => readField('twelve', intReader)).toThrow('unknown');
  });

  it('should keep the offending text on the error', () => {
    try {
      readField('twelve', intReader);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FieldDecodeError);
      expect((error as FieldDecodeError).text).toBe('twelve');
      expect((error as FieldDecodeError).code).toBe('FIELD_DECODE_FAILED');
    }
  });
});

describe('readFieldAfterDashToCamel', () => {
  const species = enumReader(['irisSetosa', 'irisVersicolor', 'irisVirginica']);

  it('should camel-case the text before reading it', () => {
    expect(readFieldAfterDashToCamel('iris-versicolor', species)).toBe('irisVersicolor');
  });

  it('should fail with unknown when the camel-cased text is not readable', () => {
    expect(() => readFieldAfterDashToCamel('iris-unknown', species)).toThrow('unknown');
  });
});
