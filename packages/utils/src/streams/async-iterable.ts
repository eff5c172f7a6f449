/**
 * Check if input is async iterable.
 */
export function isAsyncIterable<T>(input: unknown): input is AsyncIterable<T> {
  return input !== null && typeof input === "object" && Symbol.asyncIterator in input;
}

/**
 * Normalize sync or async iterable to async iterable.
 */
export function asAsyncIterable<T>(input: AsyncIterable<T> | Iterable<T>): AsyncIterable<T> {
  if (isAsyncIterable<T>(input)) {
    return input;
  }
  return {
    async *[Symbol.asyncIterator]() {
      yield* input;
    },
  };
}
