/**
 * zlib compression for offline payloads using pako.
 */

import pako from 'pako';
import { CorruptCompressedDataError, InvalidParameterError } from '../exceptions';

export type CompressionLevel = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export function isCompressionLevel(level: number): level is CompressionLevel {
  return Number.isInteger(level) && level >= 1 && level <= 9;
}

/**
 * Compress data using zlib.
 *
 * @param data - Raw payload
 * @param level - Compression level (1 = fastest, 6 = default, 9 = best)
 * @returns zlib stream (header + deflate + adler32)
 * @throws {InvalidParameterError} If level is outside 1-9
 */
export function compressPayload(data: Uint8Array, level: number = 6): Uint8Array {
  if (!isCompressionLevel(level)) {
    throw new InvalidParameterError('compressionLevel', level, 'must be 1-9');
  }

  const compressed = pako.deflate(data, { level });

  const ratio = data.length > 0 ? (compressed.length / data.length) * 100 : 0;
  console.debug(
    `Compressed ${data.length} bytes -> ${compressed.length} bytes (${ratio.toFixed(1)}%)`
  );

  return compressed;
}

/**
 * Decompress a zlib stream.
 *
 * @throws {CorruptCompressedDataError} If the stream is damaged
 */
export function decompressPayload(data: Uint8Array): Uint8Array {
  let result: Uint8Array | undefined;
  try {
    result = pako.inflate(data);
  } catch (error) {
    // pako throws its message string, not an Error
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorruptCompressedDataError(`Decompression failed: ${reason}`);
  }

  // A stream cut short inflates without error but never produces a result
  if (!(result instanceof Uint8Array)) {
    throw new CorruptCompressedDataError('Decompression failed: incomplete zlib stream');
  }
  return result;
}
