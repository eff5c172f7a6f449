import { type ByteSource, ByteArrayBuilder, END_OF_STREAM } from "@splitwire/utils";
import { ChunkTooLargeError, MalformedChunkHeaderError, TruncatedChunkError } from "../errors.js";
import { type ChunkParser, resolveMaxChunkSize } from "./types.js";

/**
 * Length header layouts:
 * - `hex4`: four ASCII hex digits (`000b`), as in pkt-line framing
 * - `uint32be`: four bytes, unsigned big-endian
 *
 * In both cases the length counts the payload only.
 */
export type LengthPrefixFormat = "hex4" | "uint32be";

export interface LengthPrefixedParserOptions {
  format?: LengthPrefixFormat;
  maxChunkSize?: number;
}

const HEADER_SIZE = 4;
const HEX_HEADER = /^[0-9a-fA-F]{4}$/;

/**
 * Length-prefixed framing: every chunk carries its own size instead of
 * being terminated by a boundary.
 */
export class LengthPrefixedParser implements ChunkParser {
  readonly format: LengthPrefixFormat;
  private readonly maxChunkSize: number;

  constructor(options: LengthPrefixedParserOptions = {}) {
    this.format = options.format ?? "hex4";
    this.maxChunkSize = resolveMaxChunkSize(options.maxChunkSize);
  }

  async readChunk(source: ByteSource): Promise<Uint8Array | null> {
    const header = new Uint8Array(HEADER_SIZE);
    for (let i = 0; i < HEADER_SIZE; i++) {
      const b = await source.read();
      if (b === END_OF_STREAM) {
        if (i === 0) return null;
        throw new TruncatedChunkError(`Unexpected end of stream in chunk header after ${i} bytes`);
      }
      header[i] = b;
    }

    const length = this.parseLength(header);
    if (length > this.maxChunkSize) {
      throw new ChunkTooLargeError(this.maxChunkSize);
    }

    // The header is untrusted: grow with the payload instead of allocating `length` up front.
    const chunk = new ByteArrayBuilder();
    while (chunk.length < length) {
      const b = await source.read();
      if (b === END_OF_STREAM) {
        throw new TruncatedChunkError(
          `Unexpected end of stream: wanted ${length} bytes, have ${chunk.length}`,
        );
      }
      chunk.append(b);
    }
    return chunk.toBytes();
  }

  private parseLength(header: Uint8Array): number {
    if (this.format === "uint32be") {
      return new DataView(header.buffer, header.byteOffset, HEADER_SIZE).getUint32(0, false);
    }
    const text = String.fromCharCode(...header);
    if (!HEX_HEADER.test(text)) {
      throw new MalformedChunkHeaderError(`Invalid chunk length header: ${JSON.stringify(text)}`, text);
    }
    return Number.parseInt(text, 16);
  }
}
