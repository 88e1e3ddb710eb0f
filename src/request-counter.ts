export interface RequestCounter {
  /** Adds one handled request and returns the new total */
  increment(): number
  current(): number
}

/**
 * Counter owned by a single event loop. Increments run synchronously, so
 * concurrent requests on the same loop cannot interleave inside one.
 */
export class LocalRequestCounter implements RequestCounter {
  private count = 0

  increment(): number {
    this.count += 1
    return this.count
  }

  current(): number {
    return this.count
  }
}

/**
 * Counter stored in shared memory so worker threads of the same process
 * can count into one total. Pass {@link buffer} to each worker and wrap it
 * with a new SharedRequestCounter there.
 */
export class SharedRequestCounter implements RequestCounter {
  readonly buffer: SharedArrayBuffer
  private cells: BigInt64Array

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(BigInt64Array.BYTES_PER_ELEMENT)) {
    if (buffer.byteLength < BigInt64Array.BYTES_PER_ELEMENT) {
      throw new RangeError(`SharedRequestCounter needs at least ${BigInt64Array.BYTES_PER_ELEMENT} bytes`)
    }
    this.buffer = buffer
    this.cells = new BigInt64Array(buffer, 0, 1)
  }

  increment(): number {
    // Atomics.add returns the value before the addition
    return Number(Atomics.add(this.cells, 0, 1n)) + 1
  }

  current(): number {
    return Number(Atomics.load(this.cells, 0))
  }
}
