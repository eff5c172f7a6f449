import { decodeString, readAll } from "@splitwire/utils";
import { ChunkDecodeError } from "../errors.js";
import type { ChunkDecoder, DecodeContext } from "./types.js";

/**
 * Returns the chunk bytes as they are.
 */
export const bytesDecoder: ChunkDecoder<Uint8Array> = {
  decode: (chunk) => readAll(chunk),
};

/**
 * Decodes the chunk as text in the media type's charset (UTF-8 if unset).
 */
export const textDecoder: ChunkDecoder<string> = {
  async decode(chunk, context) {
    return decodeText(await readAll(chunk), context);
  },
};

/**
 * Parses the chunk as JSON and hands the result to `parse`, which checks
 * and shapes it. Errors thrown by `parse` are not wrapped.
 */
export function jsonDecoder<T>(parse: (value: unknown) => T): ChunkDecoder<T> {
  return {
    async decode(chunk, context) {
      const text = decodeText(await readAll(chunk), context);
      let value: unknown;
      try {
        value = JSON.parse(text);
      } catch (error) {
        throw new ChunkDecodeError(`Invalid JSON chunk for ${context.type.name}`, error);
      }
      return parse(value);
    },
  };
}

function decodeText(data: Uint8Array, context: DecodeContext): string {
  const charset = context.mediaType.charset ?? "utf-8";
  try {
    return decodeString(data, charset);
  } catch (error) {
    throw new ChunkDecodeError(`Unsupported charset: ${charset}`, error);
  }
}
