"use strict";

import type { Readable, Writable } from "node:stream";

import { concatBytes } from "../binary-utils.js";

/** Pull side of a byte stream. `read` may fill less than `target`; 0 means the stream ended. */
export interface ByteSource {
  read(target: Uint8Array): Promise<number>;
}

/** Push side of a byte stream. Resolves with the number of bytes accepted. */
export interface ByteSink {
  write(bytes: Uint8Array): Promise<number>;
}

export interface BlobLike {
  readonly size: number;
  slice(start: number, end: number): { arrayBuffer(): Promise<ArrayBuffer> };
}

export interface FileHandleReader {
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number | null
  ): Promise<{ bytesRead: number }>;
}

export interface FileHandleWriter {
  write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number | null
  ): Promise<{ bytesWritten: number }>;
}

/**
 * Reads until `target` is full or the source reports the end.
 * Returns the number of bytes placed in `target`.
 */
export const readFully = async (source: ByteSource, target: Uint8Array): Promise<number> => {
  let filled = 0;
  while (filled < target.length) {
    const count = await source.read(target.subarray(filled));
    if (count === 0) break;
    filled += count;
  }
  return filled;
};

export const bytesSource = (bytes: Uint8Array, maxChunk = Number.POSITIVE_INFINITY): ByteSource => {
  let offset = 0;
  return {
    read: async target => {
      const count = Math.min(target.length, bytes.length - offset, maxChunk);
      if (count <= 0) return 0;
      target.set(bytes.subarray(offset, offset + count));
      offset += count;
      return count;
    }
  };
};

export const blobSource = (blob: BlobLike): ByteSource => {
  let offset = 0;
  return {
    read: async target => {
      const end = Math.min(blob.size, offset + target.length);
      if (end <= offset) return 0;
      const chunk = new Uint8Array(await blob.slice(offset, end).arrayBuffer());
      const copied = Math.min(chunk.length, target.length);
      target.set(chunk.subarray(0, copied));
      offset += copied;
      return copied;
    }
  };
};

export const fileHandleSource = (handle: FileHandleReader): ByteSource => ({
  read: async target => {
    if (target.length === 0) return 0;
    const { bytesRead } = await handle.read(target, 0, target.length, null);
    return bytesRead;
  }
});

export const readableSource = (stream: Readable): ByteSource => {
  const iterator: AsyncIterator<unknown> = stream[Symbol.asyncIterator]();
  let pending: Uint8Array = new Uint8Array(0);
  let ended = false;
  return {
    read: async target => {
      if (target.length === 0) return 0;
      while (pending.length === 0) {
        if (ended) return 0;
        const next = await iterator.next();
        if (next.done) {
          ended = true;
          return 0;
        }
        const chunk = next.value;
        if (!(chunk instanceof Uint8Array)) {
          throw new TypeError("Readable stream produced a non-binary chunk.");
        }
        pending = chunk;
      }
      const count = Math.min(target.length, pending.length);
      target.set(pending.subarray(0, count));
      pending = pending.subarray(count);
      return count;
    }
  };
};

export const fileHandleSink = (handle: FileHandleWriter): ByteSink => ({
  write: async bytes => {
    const { bytesWritten } = await handle.write(bytes, 0, bytes.length, null);
    return bytesWritten;
  }
});

export const writableSink = (stream: Writable): ByteSink => ({
  write: bytes =>
    new Promise<number>((resolve, reject) => {
      stream.write(bytes, error => {
        if (error) reject(error);
        else resolve(bytes.length);
      });
    })
});

/** Collects copies of everything written to it. */
export class MemorySink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private total = 0;

  get length(): number {
    return this.total;
  }

  async write(bytes: Uint8Array): Promise<number> {
    this.chunks.push(bytes.slice());
    this.total += bytes.length;
    return bytes.length;
  }

  toUint8Array(): Uint8Array {
    return concatBytes(this.chunks);
  }
}
