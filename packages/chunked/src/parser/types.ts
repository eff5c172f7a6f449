import type { ByteSource } from "@splitwire/utils";
import { InvalidArgumentError } from "../errors.js";

/**
 * Boundary detection strategy.
 *
 * `readChunk` consumes bytes from the source until one complete chunk is
 * available and resolves with its content (framing excluded), or with
 * `null` once the source holds no further chunks. Implementations keep no
 * reference to returned buffers.
 *
 * Parsers are not safe for concurrent use: two `readChunk` calls on the
 * same source must not overlap.
 */
export interface ChunkParser {
  readChunk(source: ByteSource): Promise<Uint8Array | null>;
}

/**
 * Normalize a `maxChunkSize` option. Absent means unlimited.
 */
export function resolveMaxChunkSize(value: number | undefined): number {
  if (value === undefined || value === Number.POSITIVE_INFINITY) {
    return Number.POSITIVE_INFINITY;
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`maxChunkSize must be a non-negative integer, got ${value}`);
  }
  return value;
}
