/**
 * Encode string to UTF-8 bytes.
 */
export function encodeString(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * Decode bytes to string.
 *
 * Throws a `RangeError` for a charset the runtime does not know.
 */
export function decodeString(data: Uint8Array, charset = "utf-8"): string {
  return new TextDecoder(charset).decode(data);
}
