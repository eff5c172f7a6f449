/**
 * Chunked input error classes.
 */

/**
 * Base error for all chunked input operations.
 */
export class ChunkedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChunkedError";
  }
}

/**
 * A caller supplied a missing or malformed argument.
 */
export class InvalidArgumentError extends ChunkedError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Operation is not allowed in the current state (e.g. reading a closed input).
 */
export class IllegalStateError extends ChunkedError {
  constructor(message: string) {
    super(message);
    this.name = "IllegalStateError";
  }
}

/**
 * A chunk could not be converted into a value.
 */
export class ChunkDecodeError extends ChunkedError {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "ChunkDecodeError";
    this.cause = cause;
  }
}

/**
 * A chunk grew past the configured size limit.
 */
export class ChunkTooLargeError extends ChunkedError {
  readonly limit: number;

  constructor(limit: number) {
    super(`Chunk exceeds maximum size of ${limit} bytes`);
    this.name = "ChunkTooLargeError";
    this.limit = limit;
  }
}

/**
 * The stream ended in the middle of a framed chunk.
 */
export class TruncatedChunkError extends ChunkedError {
  constructor(message: string) {
    super(message);
    this.name = "TruncatedChunkError";
  }
}

/**
 * Error parsing a chunk length header.
 */
export class MalformedChunkHeaderError extends ChunkedError {
  readonly header?: string;

  constructor(message: string, header?: string) {
    super(message);
    this.name = "MalformedChunkHeaderError";
    this.header = header;
  }
}
