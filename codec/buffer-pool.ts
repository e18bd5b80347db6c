"use strict";

/**
 * A borrowed pool buffer. Reference-counted: `retain()` adds a holder,
 * `release()` drops one, and the buffer goes back to the pool when the last
 * holder lets go. Releasing a lease that is already gone does nothing.
 */
export class BufferLease {
  private refs = 1;
  readonly buffer: Uint8Array;
  private readonly pool: BufferPool;

  constructor(pool: BufferPool, buffer: Uint8Array) {
    this.pool = pool;
    this.buffer = buffer;
  }

  get released(): boolean {
    return this.refs === 0;
  }

  retain(): void {
    if (this.refs === 0) throw new Error("Cannot retain a released buffer lease.");
    this.refs += 1;
  }

  release(): void {
    if (this.refs === 0) return;
    this.refs -= 1;
    if (this.refs === 0) this.pool.release(this.buffer);
  }
}

/**
 * Free list of fixed-size byte buffers. `acquire` and `release` are
 * synchronous, so a buffer released from any task is visible to the next
 * acquire on the same event loop.
 */
export class BufferPool {
  readonly bufferSize: number;
  private readonly free: Uint8Array[] = [];
  private allocated = 0;

  constructor(bufferSize: number) {
    if (!Number.isInteger(bufferSize) || bufferSize < 0) {
      throw new RangeError(`Buffer size must be a non-negative integer: ${bufferSize}`);
    }
    this.bufferSize = bufferSize;
  }

  /** Number of buffers ever allocated by this pool. */
  get allocations(): number {
    return this.allocated;
  }

  /** Number of buffers waiting for reuse. */
  get available(): number {
    return this.free.length;
  }

  acquire(): BufferLease {
    const reused = this.free.pop();
    if (reused) return new BufferLease(this, reused);
    this.allocated += 1;
    return new BufferLease(this, new Uint8Array(this.bufferSize));
  }

  release(buffer: Uint8Array): void {
    if (buffer.length !== this.bufferSize) {
      throw new RangeError(
        `Buffer of ${buffer.length} bytes does not belong to a pool of ${this.bufferSize}-byte buffers.`
      );
    }
    if (this.free.includes(buffer)) {
      throw new RangeError("Buffer was already released to the pool.");
    }
    this.free.push(buffer);
  }
}
