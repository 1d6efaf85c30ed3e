import { describe, it, expect } from 'vitest';
import {
  dropLines,
  fixAmericanDecimals,
  fixedWidthToCSV,
  composePreprocessors,
} from '../../../src/domain/services/TextPreprocessing.js';
import { ParseError } from '../../../src/domain/errors/DatasetError.js';

function text(data: Buffer): string {
  return data.toString('utf-8');
}

describe('fixAmericanDecimals', () => {
  it('should add a leading zero to decimals that follow a comma', () => {
    expect(text(fixAmericanDecimals(Buffer.from('1,.5,2,.3')))).toBe('1,0.5,2,0.3');
  });

  it('should leave well-formed decimals untouched', () => {
    expect(text(fixAmericanDecimals(Buffer.from('0.5,1.25\n')))).toBe('0.5,1.25\n');
  });

  it('should keep non-ASCII bytes intact', () => {
    const input = Buffer.from('café,.5', 'utf-8');
    expect(text(fixAmericanDecimals(input))).toBe('café,0.5');
  });
});

describe('fixedWidthToCSV', () => {
  it('should collapse runs of spaces into single commas', () => {
    expect(text(fixedWidthToCSV(Buffer.from('a   b  c\n1   2  3\n')))).toBe('a,b,c\n1,2,3\n');
  });

  it('should strip leading spaces on every line', () => {
    expect(text(fixedWidthToCSV(Buffer.from('   1  2\n  3 4')))).toBe('1,2\n3,4');
  });

  it('should turn trailing spaces into a trailing comma', () => {
    expect(text(fixedWidthToCSV(Buffer.from('1 2   \n')))).toBe('1,2,\n');
  });
});

describe('dropLines', () => {
  it('should return the input unchanged when dropping zero lines', () => {
    expect(text(dropLines(0, Buffer.from('a\nb\n')))).toBe('a\nb\n');
  });

  it('should drop the first lines', () => {
    expect(text(dropLines(2, Buffer.from('# comment\n# comment\nx,y\n1,2\n')))).toBe('x,y\n1,2\n');
  });

  it('should yield an empty remainder when dropping exactly every line', () => {
    expect(dropLines(2, Buffer.from('a\nb\n'))).toHaveLength(0);
  });

  it('should not count a final line without a newline', () => {
    expect(() => dropLines(2, Buffer.from('a\nb'))).toThrow(
      'dropLines: cannot drop 2 lines from input with 1 line(s)',
    );
  });

  it('should keep the unterminated tail after the dropped lines', () => {
    expect(text(dropLines(1, Buffer.from('a\nb')))).toBe('b');
  });

  it('should count empty lines', () => {
    expect(text(dropLines(2, Buffer.from('a\n\nb')))).toBe('b');
  });

  it('should fail when the input has fewer lines than requested', () => {
    expect(() => dropLines(2, Buffer.from('only one\n'))).toThrow(ParseError);
    expect(() => dropLines(2, Buffer.from('only one\n'))).toThrow(
      'dropLines: cannot drop 2 lines from input with 1 line(s)',
    );
  });

  it('should fail on empty input', () => {
    expect(() => dropLines(1, Buffer.alloc(0))).toThrow(
      'dropLines: cannot drop 1 lines from input with 0 line(s)',
    );
  });

  it('should reject a negative count', () => {
    expect(() => dropLines(-1, Buffer.from('a\n'))).toThrow('dropLines: line count must be a non-negative integer');
  });
});

describe('composePreprocessors', () => {
  it('should apply steps left to right', () => {
    const preprocess = composePreprocessors((data) => dropLines(1, data), fixedWidthToCSV, fixAmericanDecimals);

    expect(text(preprocess(Buffer.from('header\n1  .5\n2  .25\n')))).toBe('1,0.5\n2,0.25\n');
  });

  it('should be the identity with no steps', () => {
    const input = Buffer.from('unchanged');
    expect(text(composePreprocessors()(input))).toBe('unchanged');
  });
});
