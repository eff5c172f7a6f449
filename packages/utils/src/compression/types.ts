/**
 * Options for block compression/decompression
 */
export interface CompressionOptions {
  /** true = raw DEFLATE (no header/checksum), false = ZLIB format (default) */
  raw?: boolean;
  /** Compression level (0-9, where 0 = no compression, 9 = maximum compression) */
  level?: number;
}

/**
 * Error thrown when compression/decompression fails
 */
export class CompressionError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "CompressionError";
  }
}
