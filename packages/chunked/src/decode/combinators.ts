import { type CompressionOptions, decompressBlock, fromBytes, readAll } from "@splitwire/utils";
import { ChunkDecodeError } from "../errors.js";
import { MediaType } from "../media/index.js";
import type { ChunkDecoder } from "./types.js";

export type DecoderEntry<T> = readonly [mediaType: MediaType | string, decoder: ChunkDecoder<T>];

/**
 * Picks the decoder registered for the chunk's media type.
 *
 * Entries are tried in order; the first whose media type is compatible with
 * the context's one wins. Without a match the fallback is used, or the
 * decode fails with {@link ChunkDecodeError}.
 *
 * @example
 * ```ts
 * const decoder = mediaTypeDecoder<Event>([
 *   ["application/json", jsonDecoder(parseEvent)],
 *   ["text/*", { decode: async (chunk, ctx) => parseEventLine(await textDecoder.decode(chunk, ctx)) }],
 * ]);
 * ```
 */
export function mediaTypeDecoder<T>(
  entries: readonly DecoderEntry<T>[],
  fallback?: ChunkDecoder<T>,
): ChunkDecoder<T> {
  const table = entries.map(
    ([mediaType, decoder]) =>
      [typeof mediaType === "string" ? MediaType.valueOf(mediaType) : mediaType, decoder] as const,
  );
  return {
    decode(chunk, context) {
      for (const [mediaType, decoder] of table) {
        if (mediaType.isCompatible(context.mediaType)) {
          return decoder.decode(chunk, context);
        }
      }
      if (fallback) {
        return fallback.decode(chunk, context);
      }
      throw new ChunkDecodeError(
        `No decoder for ${context.type.name} chunks of type ${context.mediaType.toString()}`,
      );
    },
  };
}

/**
 * Inflates every chunk (zlib, or raw DEFLATE with `raw: true`) before
 * handing it to `decoder`.
 */
export function inflating<T>(
  decoder: ChunkDecoder<T>,
  options?: Pick<CompressionOptions, "raw">,
): ChunkDecoder<T> {
  return {
    async decode(chunk, context) {
      const compressed = await readAll(chunk);
      let data: Uint8Array;
      try {
        data = decompressBlock(compressed, options);
      } catch (error) {
        throw new ChunkDecodeError(`Cannot inflate ${context.type.name} chunk`, error);
      }
      return decoder.decode(fromBytes(data), context);
    },
  };
}
