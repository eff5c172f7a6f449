import { asAsyncIterable } from "./async-iterable.js";

/**
 * Value returned by {@link ByteSource.read} once the source has no more bytes.
 */
export const END_OF_STREAM = -1;

/**
 * Byte-at-a-time readable source.
 *
 * `read()` resolves with the next byte (0..255) or {@link END_OF_STREAM},
 * and rejects when the underlying transport fails. Consumed bytes are gone:
 * there is no rewind.
 */
export interface ByteSource {
  read(): Promise<number>;
  close(): Promise<void>;
}

/**
 * In-memory source over a single buffer.
 *
 * The buffer is not copied; callers handing out a source over shared
 * memory must pass a copy.
 */
export function fromBytes(data: Uint8Array): ByteSource {
  let pos = 0;
  let closed = false;
  return {
    async read(): Promise<number> {
      if (closed || pos >= data.length) return END_OF_STREAM;
      return data[pos++];
    },
    async close(): Promise<void> {
      closed = true;
    },
  };
}

/**
 * Byte source over a block stream (a Node.js `Readable`, an async generator,
 * an array of blocks...).
 *
 * Holds at most one upstream block at a time. Errors thrown by the upstream
 * iterator reject the pending `read()`. Closing the source calls `return()`
 * on the upstream iterator, which releases Node.js streams.
 */
export function fromAsyncIterable(
  input: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
): ByteSource {
  const iterator = asAsyncIterable(input)[Symbol.asyncIterator]();
  let block: Uint8Array = new Uint8Array(0);
  let pos = 0;
  let done = false;

  return {
    async read(): Promise<number> {
      while (pos >= block.length) {
        if (done) return END_OF_STREAM;
        const slot = await iterator.next();
        if (slot.done) {
          done = true;
          return END_OF_STREAM;
        }
        block = slot.value;
        pos = 0;
      }
      return block[pos++];
    },
    async close(): Promise<void> {
      if (done) return;
      done = true;
      block = new Uint8Array(0);
      pos = 0;
      await iterator.return?.();
    },
  };
}

/**
 * Drain a byte source into one buffer. The source is not closed.
 */
export async function readAll(source: ByteSource): Promise<Uint8Array> {
  const builder = new ByteArrayBuilder();
  for (let b = await source.read(); b !== END_OF_STREAM; b = await source.read()) {
    builder.append(b);
  }
  return builder.toBytes();
}

/**
 * Growable byte buffer.
 */
export class ByteArrayBuilder {
  private buffer: Uint8Array;
  private size = 0;

  constructor(initialCapacity = 64) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
  }

  get length(): number {
    return this.size;
  }

  append(byte: number): void {
    this.ensureCapacity(this.size + 1);
    this.buffer[this.size++] = byte;
  }

  appendAll(bytes: Uint8Array, start = 0, end = bytes.length): void {
    const count = end - start;
    if (count <= 0) return;
    this.ensureCapacity(this.size + count);
    this.buffer.set(bytes.subarray(start, end), this.size);
    this.size += count;
  }

  /** Returns a copy of the accumulated bytes; later appends do not affect it. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.size);
  }

  clear(): void {
    this.size = 0;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < required) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.size));
    this.buffer = next;
  }
}
