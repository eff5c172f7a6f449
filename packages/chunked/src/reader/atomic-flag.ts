/**
 * Boolean flag with compare-and-set, backed by `Atomics` so the transition
 * stays exact even when the flag is shared with workers.
 */
export class AtomicFlag {
  private readonly cell = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

  constructor(initial = false) {
    Atomics.store(this.cell, 0, initial ? 1 : 0);
  }

  get(): boolean {
    return Atomics.load(this.cell, 0) === 1;
  }

  /**
   * Set the flag to `update` if it currently equals `expected`.
   * @returns true if this call performed the transition
   */
  compareAndSet(expected: boolean, update: boolean): boolean {
    const from = expected ? 1 : 0;
    return Atomics.compareExchange(this.cell, 0, from, update ? 1 : 0) === from;
  }
}
