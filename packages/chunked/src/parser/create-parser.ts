import { encodeString } from "@splitwire/utils";
import { FixedBoundaryParser, type FixedBoundaryParserOptions } from "./fixed-boundary-parser.js";
import type { ChunkParser } from "./types.js";

/** Boundary used when none is configured: CRLF. */
export const DEFAULT_BOUNDARY = "\r\n";

/**
 * Create a parser that splits the stream on a fixed boundary.
 *
 * String boundaries are UTF-8 encoded.
 *
 * @example
 * ```ts
 * const parser = createParser("\n", { skipEmpty: true });
 * ```
 */
export function createParser(
  boundary: string | Uint8Array,
  options?: FixedBoundaryParserOptions,
): ChunkParser {
  const bytes = typeof boundary === "string" ? encodeString(boundary) : boundary;
  return new FixedBoundaryParser(bytes, options);
}
