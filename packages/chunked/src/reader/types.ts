import type { ByteSource } from "@splitwire/utils";
import type { ChunkDecoder, ChunkType, HeaderMap } from "../decode/index.js";
import type { MediaType } from "../media/index.js";
import type { ChunkParser } from "../parser/index.js";

/**
 * Optional logger for diagnostics.
 */
export interface ChunkedLogger {
  debug?: (...args: unknown[]) => void;
}

/**
 * Construction input of a {@link ChunkedReader}, usually taken from the
 * response the chunks arrive in.
 */
export interface ChunkedReaderInit<T> {
  /** Descriptor of the decoded values. */
  type: ChunkType;
  /** Stream the chunks are read from. Closed together with the reader. */
  source: ByteSource;
  decoder: ChunkDecoder<T>;
  annotations?: readonly unknown[];
  /**
   * Media type of every chunk. Defaults to the `Content-Type` header, then
   * to `application/octet-stream`; a malformed header is logged and ignored.
   */
  mediaType?: MediaType | string;
  headers?: HeaderMap;
  /** Request-scoped properties passed through to the decoder. */
  properties?: ReadonlyMap<string, unknown>;
  /** Boundary detection strategy. Defaults to a CRLF boundary. */
  parser?: ChunkParser;
  logger?: ChunkedLogger;
}

/**
 * Why a reader is closed.
 *
 * - `end-of-stream`: the parser reported no further chunks
 * - `closed`: `close()` was called
 * - `error`: reading from the source failed; the reader closed itself
 */
export type CloseReason =
  | { type: "end-of-stream" }
  | { type: "closed" }
  | { type: "error"; error: unknown };
