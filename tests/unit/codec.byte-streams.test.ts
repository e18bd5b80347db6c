"use strict";

import assert from "node:assert/strict";
import { Readable, Writable } from "node:stream";
import { test } from "node:test";

import {
  MemorySink,
  blobSource,
  bytesSource,
  fileHandleSink,
  fileHandleSource,
  readFully,
  readableSource,
  writableSink
} from "../../codec/byte-streams.js";
import { MockFile } from "../helpers/mock-file.js";
import { ChunkedSource } from "../helpers/stream-stubs.js";

void test("readFully retries partial reads until the target is full", async () => {
  const source = new ChunkedSource(new Uint8Array([1, 2, 3, 4, 5, 6, 7]), 3);
  const target = new Uint8Array(7);
  assert.strictEqual(await readFully(source, target), 7);
  assert.deepStrictEqual([...target], [1, 2, 3, 4, 5, 6, 7]);
  assert.strictEqual(source.reads, 3);
});

void test("readFully reports how much it got when the source ends early", async () => {
  const source = new ChunkedSource(new Uint8Array([9, 8]), 1);
  const target = new Uint8Array(4);
  assert.strictEqual(await readFully(source, target), 2);
  assert.deepStrictEqual([...target], [9, 8, 0, 0]);
});

void test("bytesSource honours its chunk limit and ends with 0", async () => {
  const source = bytesSource(new Uint8Array([1, 2, 3]), 2);
  const target = new Uint8Array(3);
  assert.strictEqual(await source.read(target), 2);
  assert.strictEqual(await source.read(target.subarray(2)), 1);
  assert.strictEqual(await source.read(target), 0);
  assert.deepStrictEqual([...target], [1, 2, 3]);
});

void test("blobSource slices the file at the current offset", async () => {
  const file = new MockFile(new Uint8Array([10, 11, 12, 13, 14]));
  const source = blobSource(file);
  const first = new Uint8Array(2);
  const second = new Uint8Array(4);
  assert.strictEqual(await source.read(first), 2);
  assert.strictEqual(await source.read(second), 3);
  assert.strictEqual(await source.read(second), 0);
  assert.deepStrictEqual([...first], [10, 11]);
  assert.deepStrictEqual([...second.subarray(0, 3)], [12, 13, 14]);
  assert.deepStrictEqual(file.slices, [
    [0, 2],
    [2, 5]
  ]);
});

void test("readableSource splits and joins stream chunks", async () => {
  const stream = Readable.from([Buffer.from([1, 2, 3]), Buffer.from([4, 5])]);
  const source = readableSource(stream);
  const target = new Uint8Array(4);
  assert.strictEqual(await readFully(source, target), 4);
  assert.deepStrictEqual([...target], [1, 2, 3, 4]);
  const rest = new Uint8Array(4);
  assert.strictEqual(await readFully(source, rest), 1);
  assert.strictEqual(rest[0], 5);
  assert.strictEqual(await source.read(rest), 0);
});

void test("readableSource rejects text chunks", async () => {
  const source = readableSource(Readable.from(["not bytes"]));
  await assert.rejects(source.read(new Uint8Array(4)), TypeError);
});

void test("fileHandleSource reads from the current position", async () => {
  const calls: Array<[number, number, number | null]> = [];
  const handle = {
    read: async (buffer: Uint8Array, offset: number, length: number, position: number | null) => {
      calls.push([offset, length, position]);
      buffer.set([7, 7, 7].slice(0, length), offset);
      return { bytesRead: Math.min(3, length) };
    }
  };
  const source = fileHandleSource(handle);
  const target = new Uint8Array(5);
  assert.strictEqual(await source.read(target), 3);
  assert.strictEqual(await source.read(new Uint8Array(0)), 0);
  assert.deepStrictEqual(calls, [[0, 5, null]]);
  assert.deepStrictEqual([...target], [7, 7, 7, 0, 0]);
});

void test("fileHandleSink reports the bytes the handle accepted", async () => {
  const handle = {
    write: async (_buffer: Uint8Array, _offset: number, length: number, _position: number | null) => ({
      bytesWritten: Math.min(length, 2)
    })
  };
  const sink = fileHandleSink(handle);
  assert.strictEqual(await sink.write(new Uint8Array([1, 2, 3])), 2);
});

void test("writableSink resolves once the stream has taken the chunk", async () => {
  const received: number[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      received.push(...chunk);
      callback();
    }
  });
  const sink = writableSink(stream);
  assert.strictEqual(await sink.write(new Uint8Array([4, 5, 6])), 3);
  assert.deepStrictEqual(received, [4, 5, 6]);
});

void test("writableSink rejects when the stream fails the write", async () => {
  const streamErrors: Error[] = [];
  const stream = new Writable({
    write(_chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      callback(new Error("disk full"));
    }
  });
  stream.on("error", error => streamErrors.push(error));
  const sink = writableSink(stream);
  await assert.rejects(sink.write(new Uint8Array([1])), /disk full/);
});

void test("MemorySink keeps copies of written bytes", async () => {
  const sink = new MemorySink();
  const scratch = new Uint8Array([1, 2]);
  await sink.write(scratch);
  scratch[0] = 9;
  await sink.write(scratch);
  assert.strictEqual(sink.length, 4);
  assert.deepStrictEqual([...sink.toUint8Array()], [1, 2, 9, 2]);
});
