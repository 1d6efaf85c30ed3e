import { ParseError } from '../errors/DatasetError.js';
import type { Preprocessor } from '../ports/FormatParser.js';

// latin1 maps every byte to one code unit, so these string transforms keep
// non-ASCII bytes exactly as they were.
function mapBytes(data: Buffer, transform: (text: string) => string): Buffer {
  return Buffer.from(transform(data.toString('latin1')), 'latin1');
}

/**
 * Remove the first `count` newline-terminated lines. Text after the last newline
 * is never dropped.
 *
 * @throws ParseError when the input has fewer than `count` newline-terminated lines.
 */
export function dropLines(count: number, data: Buffer): Buffer {
  if (!Number.isInteger(count) || count < 0) {
    throw new ParseError(`dropLines: line count must be a non-negative integer, got ${String(count)}`);
  }

  let offset = 0;
  for (let dropped = 0; dropped < count; dropped++) {
    const newline = data.indexOf(0x0a, offset);
    if (newline === -1) {
      throw new ParseError(
        `dropLines: cannot drop ${String(count)} lines from input with ${String(dropped)} line(s)`,
      );
    }
    offset = newline + 1;
  }

  return data.subarray(offset);
}

/** Turn decimals written without a leading zero after a comma (`,.5`) into `,0.5`. */
export function fixAmericanDecimals(data: Buffer): Buffer {
  return mapBytes(data, (text) => text.replaceAll(',.', ',0.'));
}

/**
 * Convert space-aligned columns into comma-separated text. Leading spaces of each
 * line are dropped and every other run of spaces becomes a single comma.
 */
export function fixedWidthToCSV(data: Buffer): Buffer {
  return mapBytes(data, (text) =>
    text
      .split('\n')
      .map((line) => line.replace(/^ +/, '').replace(/ +/g, ','))
      .join('\n'),
  );
}

/** Chain preprocessors left to right. */
export function composePreprocessors(...steps: readonly Preprocessor[]): Preprocessor {
  return (data) => steps.reduce((current, step) => step(current), data);
}
