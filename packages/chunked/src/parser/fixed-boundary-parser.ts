import { type ByteSource, ByteArrayBuilder, END_OF_STREAM } from "@splitwire/utils";
import { ChunkTooLargeError, InvalidArgumentError } from "../errors.js";
import { type ChunkParser, resolveMaxChunkSize } from "./types.js";

export interface FixedBoundaryParserOptions {
  /**
   * Read past empty chunks (consecutive boundaries, or a boundary at the
   * very start of the stream) instead of returning them. Default: false.
   */
  skipEmpty?: boolean;
  /** Largest chunk accepted, in bytes. Default: unlimited. */
  maxChunkSize?: number;
}

/**
 * Splits a stream on a fixed byte sequence.
 *
 * Bytes are read one at a time. A run of bytes matching a prefix of the
 * boundary is held back until the match completes or fails; on failure the
 * held bytes that can no longer start a match go to the chunk as ordinary
 * content and the current byte is compared again against the shorter match
 * (the boundary's own prefix table decides how much of the run survives).
 * Trailing content without a closing boundary is returned as the last
 * chunk.
 */
export class FixedBoundaryParser implements ChunkParser {
  private readonly delimiter: Uint8Array;
  /** fallback[i]: length of the longest proper border of delimiter[0..i] */
  private readonly fallback: Int32Array;
  private readonly skipEmpty: boolean;
  private readonly maxChunkSize: number;

  constructor(boundary: Uint8Array, options: FixedBoundaryParserOptions = {}) {
    if (boundary.length === 0) {
      throw new InvalidArgumentError("Chunk boundary must not be empty");
    }
    this.delimiter = boundary.slice();
    this.fallback = computeFallback(this.delimiter);
    this.skipEmpty = options.skipEmpty ?? false;
    this.maxChunkSize = resolveMaxChunkSize(options.maxChunkSize);
  }

  /** Copy of the boundary bytes. */
  get boundary(): Uint8Array {
    return this.delimiter.slice();
  }

  async readChunk(source: ByteSource): Promise<Uint8Array | null> {
    const delimiter = this.delimiter;
    const chunk = new ByteArrayBuilder();

    while (true) {
      let matched = 0;
      let found = false;

      for (let b = await source.read(); b !== END_OF_STREAM; b = await source.read()) {
        while (true) {
          if (b === delimiter[matched]) {
            matched++;
            break;
          }
          if (matched === 0) {
            chunk.append(b);
            break;
          }
          const keep = this.fallback[matched - 1];
          chunk.appendAll(delimiter, 0, matched - keep);
          matched = keep;
        }
        this.checkSize(chunk.length);
        if (matched === delimiter.length) {
          found = true;
          break;
        }
      }

      if (!found) {
        // End of stream: a dangling partial match is plain content.
        chunk.appendAll(delimiter, 0, matched);
        this.checkSize(chunk.length);
        return chunk.length > 0 ? chunk.toBytes() : null;
      }
      if (chunk.length > 0 || !this.skipEmpty) {
        return chunk.toBytes();
      }
    }
  }

  private checkSize(size: number): void {
    if (size > this.maxChunkSize) {
      throw new ChunkTooLargeError(this.maxChunkSize);
    }
  }
}

function computeFallback(pattern: Uint8Array): Int32Array {
  const table = new Int32Array(pattern.length);
  let k = 0;
  for (let i = 1; i < pattern.length; i++) {
    while (k > 0 && pattern[i] !== pattern[k]) {
      k = table[k - 1];
    }
    if (pattern[i] === pattern[k]) k++;
    table[i] = k;
  }
  return table;
}
