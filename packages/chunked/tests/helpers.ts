import {
  type ByteSource,
  decodeString,
  encodeString,
  fromAsyncIterable,
  fromBytes,
} from "@splitwire/utils";
import type { ChunkParser } from "../src/index.js";

export function textSource(text: string): ByteSource {
  return fromBytes(encodeString(text));
}

/**
 * Source delivering the text in blocks of `size` bytes.
 */
export function blockSource(text: string, size: number): ByteSource {
  const bytes = encodeString(text);
  const blocks: Uint8Array[] = [];
  for (let i = 0; i < bytes.length; i += size) {
    blocks.push(bytes.slice(i, i + size));
  }
  return fromAsyncIterable(blocks);
}

/**
 * Source that yields `text` and then fails with `error`.
 */
export function failingSource(text: string, error: Error): ByteSource {
  async function* blocks(): AsyncGenerator<Uint8Array> {
    yield encodeString(text);
    throw error;
  }
  return fromAsyncIterable(blocks());
}

/**
 * Run the parser until it reports the end of the stream.
 */
export async function readAllChunks(parser: ChunkParser, source: ByteSource): Promise<string[]> {
  const chunks: string[] = [];
  let chunk = await parser.readChunk(source);
  while (chunk !== null) {
    chunks.push(decodeString(chunk));
    chunk = await parser.readChunk(source);
  }
  return chunks;
}
