/**
 * Pako-based block compression.
 *
 * Works the same in Node.js and browsers; whole blocks only.
 */

import pako from "pako";
import { CompressionError, type CompressionOptions } from "./types.js";

type PakoLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | -1;

function toPakoLevel(level: number | undefined): PakoLevel {
  switch (level) {
    case 0:
    case 1:
    case 2:
    case 3:
    case 4:
    case 5:
    case 6:
    case 7:
    case 8:
    case 9:
      return level;
    case undefined:
      return 6;
    default:
      return -1;
  }
}

/**
 * Compress data using pako (block)
 */
export function compressBlock(data: Uint8Array, options?: CompressionOptions): Uint8Array {
  const level = toPakoLevel(options?.level);
  try {
    if (options?.raw) {
      return pako.deflateRaw(data, { level });
    }
    return pako.deflate(data, { level });
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    throw new CompressionError(`Pako compression failed: ${err.message}`, err);
  }
}

/**
 * Decompress data using pako (block)
 */
export function decompressBlock(data: Uint8Array, options?: CompressionOptions): Uint8Array {
  try {
    if (options?.raw) {
      return pako.inflateRaw(data);
    }
    return pako.inflate(data);
  } catch (error) {
    // pako throws plain strings for corrupt input
    const err = error instanceof Error ? error : new Error(String(error));
    throw new CompressionError(`Pako decompression failed: ${err.message}`, err);
  }
}
