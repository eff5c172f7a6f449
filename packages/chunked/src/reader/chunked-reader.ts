import { type ByteSource, fromBytes } from "@splitwire/utils";
import {
  type ChunkDecoder,
  type ChunkType,
  type DecodeContext,
  getHeader,
  type HeaderMap,
} from "../decode/index.js";
import { IllegalStateError, InvalidArgumentError } from "../errors.js";
import { MediaType } from "../media/index.js";
import { type ChunkParser, createParser, DEFAULT_BOUNDARY } from "../parser/index.js";
import { AtomicFlag } from "./atomic-flag.js";
import type { ChunkedLogger, ChunkedReaderInit, CloseReason } from "./types.js";

/**
 * Reads a chunked stream one decoded value at a time.
 *
 * Each `read()` takes the next chunk from the active {@link ChunkParser}
 * and converts it with the decoder. Once the parser runs out of chunks, or
 * the source fails, the reader closes itself and `read()` resolves with
 * `null`; both cases look the same from the return value, so use
 * {@link getCloseReason} to tell them apart.
 *
 * A reader has one consumer: `read()`, `setParser()` and `setChunkType()`
 * must not overlap. Only `close()` may be called from anywhere, any number
 * of times.
 *
 * @example
 * ```ts
 * const reader = new ChunkedReader({
 *   type: chunkType("string"),
 *   source: fromAsyncIterable(response.body),
 *   decoder: textDecoder,
 *   parser: createParser("\n"),
 * });
 * for await (const line of reader) {
 *   console.log(line);
 * }
 * ```
 */
export class ChunkedReader<T> implements AsyncIterable<T> {
  private readonly closed = new AtomicFlag(false);
  private released: Promise<void> = Promise.resolve();
  private closeReason: CloseReason | null = null;

  private parser: ChunkParser;
  private mediaType: MediaType;

  private readonly type: ChunkType;
  private readonly source: ByteSource;
  private readonly decoder: ChunkDecoder<T>;
  private readonly annotations: readonly unknown[];
  private readonly headers: HeaderMap;
  private readonly properties: ReadonlyMap<string, unknown>;
  private readonly logger?: ChunkedLogger;

  constructor(init: ChunkedReaderInit<T>) {
    this.type = init.type;
    this.source = init.source;
    this.decoder = init.decoder;
    this.annotations = [...(init.annotations ?? [])];
    this.headers = init.headers ?? {};
    this.properties = init.properties ?? new Map();
    this.logger = init.logger;
    this.parser = init.parser ?? createParser(DEFAULT_BOUNDARY);
    this.mediaType =
      init.mediaType !== undefined
        ? resolveMediaType(init.mediaType)
        : this.headerMediaType() ?? MediaType.APPLICATION_OCTET_STREAM;
  }

  getParser(): ChunkParser {
    return this.parser;
  }

  /**
   * Replace the boundary detection strategy for subsequent reads.
   */
  setParser(parser: ChunkParser | null | undefined): void {
    if (!parser) {
      throw new InvalidArgumentError("Chunk parser must not be null");
    }
    this.parser = parser;
  }

  /** Media type handed to the decoder with every chunk. */
  getChunkType(): MediaType {
    return this.mediaType;
  }

  /**
   * Override the chunk media type for subsequent reads.
   *
   * @throws InvalidArgumentError if the value is missing or cannot be parsed
   */
  setChunkType(mediaType: MediaType | string | null | undefined): void {
    if (mediaType === null || mediaType === undefined) {
      throw new InvalidArgumentError("Chunk media type must not be null");
    }
    this.mediaType = resolveMediaType(mediaType);
  }

  isClosed(): boolean {
    return this.closed.get();
  }

  /** `null` while the reader is open. */
  getCloseReason(): CloseReason | null {
    return this.closeReason;
  }

  /**
   * Read and decode the next chunk.
   *
   * @returns the decoded chunk, or `null` when no chunk is left or the
   *   source failed (the reader is closed in both cases)
   * @throws IllegalStateError if the reader is closed
   */
  async read(): Promise<T | null> {
    if (this.closed.get()) {
      throw new IllegalStateError("Chunked input has been closed");
    }

    let chunk: Uint8Array | null;
    try {
      chunk = await this.parser.readChunk(this.source);
    } catch (error) {
      this.logger?.debug?.("Failed to read chunk:", error);
      await this.closeWith({ type: "error", error });
      return null;
    }

    if (chunk === null) {
      await this.closeWith({ type: "end-of-stream" });
      return null;
    }
    // Closed while the source was pending: the chunk may be cut short.
    if (this.closed.get()) {
      return null;
    }
    return await this.decoder.decode(fromBytes(chunk), this.createContext());
  }

  /**
   * Close the reader and release the source. Only the first call releases;
   * every call resolves once the source is released.
   */
  async close(): Promise<void> {
    await this.closeWith({ type: "closed" });
  }

  /**
   * Yields decoded chunks until the stream ends. Leaving the loop early
   * closes the reader.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    try {
      while (!this.closed.get()) {
        const value = await this.read();
        if (value === null) return;
        yield value;
      }
    } finally {
      await this.close();
    }
  }

  private async closeWith(reason: CloseReason): Promise<void> {
    if (this.closed.compareAndSet(false, true)) {
      this.closeReason = reason;
      this.released = this.release();
    }
    await this.released;
  }

  private async release(): Promise<void> {
    try {
      await this.source.close();
    } catch (error) {
      this.logger?.debug?.("Failed to close chunk source:", error);
    }
  }

  private headerMediaType(): MediaType | undefined {
    const header = getHeader(this.headers, "content-type");
    if (header === undefined) return undefined;
    try {
      return MediaType.valueOf(header);
    } catch (error) {
      this.logger?.debug?.(`Ignoring malformed Content-Type "${header}":`, error);
      return undefined;
    }
  }

  private createContext(): DecodeContext {
    return {
      type: this.type,
      rawType: this.type.rawType,
      annotations: this.annotations,
      mediaType: this.mediaType,
      headers: this.headers,
      properties: this.properties,
      entityStream: false,
    };
  }
}

function resolveMediaType(value: MediaType | string): MediaType {
  return typeof value === "string" ? MediaType.valueOf(value) : value;
}
