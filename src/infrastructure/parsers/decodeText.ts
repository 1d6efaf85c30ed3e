import type { DecodeResult } from '../../domain/model/DecodeResult.js';
import { decoded, decodeFailed } from '../../domain/model/DecodeResult.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Decode the payload as UTF-8, failing on any invalid byte sequence instead of substituting U+FFFD. */
export function decodeUtf8(data: Buffer): DecodeResult<string> {
  try {
    return decoded(utf8.decode(data));
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    return decodeFailed([{ path: '', message: 'input is not valid UTF-8' }]);
  }
}
