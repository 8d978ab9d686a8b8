/**
 * Byte helpers: hex and base64 text forms.
 */

import { InvalidFrameError } from '../exceptions';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const HEX_PATTERN = /^(?:[0-9A-Fa-f]{2})*$/;

/**
 * Uppercase hex without separators, e.g. `0A1B`.
 */
export function toHex(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).toUpperCase().padStart(2, '0')).join('');
}

/**
 * Spaced hex for log output, e.g. `0A 1B`.
 */
export function toHexDump(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).toUpperCase().padStart(2, '0')).join(' ');
}

export function fromHex(text: string): Uint8Array {
  if (!HEX_PATTERN.test(text)) {
    throw new InvalidFrameError(`Invalid hex string: '${text}'`);
  }
  const result = new Uint8Array(text.length / 2);
  for (let i = 0; i < result.length; i++) {
    result[i] = parseInt(text.substring(i * 2, i * 2 + 2), 16);
  }
  return result;
}

export function toBase64(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
}

/**
 * Strict base64 decode; Node's decoder silently skips bad characters.
 */
export function fromBase64(text: string): Uint8Array {
  if (text.length % 4 !== 0 || !BASE64_PATTERN.test(text)) {
    throw new InvalidFrameError(`Invalid base64 payload (${text.length} chars)`);
  }
  return new Uint8Array(Buffer.from(text, 'base64'));
}
