import type { ByteSource } from "@splitwire/utils";
import type { MediaType } from "../media/index.js";

/**
 * Header multimap. Lookups through {@link getHeader} ignore name case.
 */
export type HeaderMap = Readonly<Record<string, readonly string[]>>;

/**
 * Descriptor of the values a chunked input produces.
 *
 * `name` is the full type (`"Map<string, Price>"`), `rawType` the type
 * without its parameters (`"Map"`). Decoders use them for diagnostics and
 * lookups; they carry no runtime behaviour.
 */
export interface ChunkType {
  readonly name: string;
  readonly rawType: string;
}

export function chunkType(name: string, rawType = name.replace(/<.*$/, "")): ChunkType {
  return { name, rawType };
}

/**
 * Everything a decoder gets to know about the chunk besides its bytes.
 */
export interface DecodeContext {
  readonly type: ChunkType;
  readonly rawType: string;
  readonly annotations: readonly unknown[];
  readonly mediaType: MediaType;
  readonly headers: HeaderMap;
  /** Request-scoped properties. */
  readonly properties: ReadonlyMap<string, unknown>;
  /** True when decoding a whole entity, false for one chunk of it. */
  readonly entityStream: boolean;
}

/**
 * Converts the raw bytes of one chunk into a value.
 *
 * Thrown errors reach the caller of `ChunkedReader.read()` unchanged.
 */
export interface ChunkDecoder<T> {
  decode(chunk: ByteSource, context: DecodeContext): T | Promise<T>;
}

/**
 * First value of a header, matching the name case-insensitively.
 */
export function getHeader(headers: HeaderMap, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, values] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && values.length > 0) {
      return values[0];
    }
  }
  return undefined;
}
