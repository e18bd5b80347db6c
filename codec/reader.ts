"use strict";

import { readInt32, readUint16, readUint32 } from "../binary-utils.js";
import { BufferPool } from "./buffer-pool.js";
import type { BufferLease } from "./buffer-pool.js";
import { readFully } from "./byte-streams.js";
import type { ByteSource } from "./byte-streams.js";
import {
  FILE_HEADER_SIZE,
  NANOSECONDS_PER_MICROSECOND,
  PCAP_MAGIC_NSEC,
  PCAP_MAGIC_NSEC_SWAPPED,
  PCAP_MAGIC_USEC,
  PCAP_MAGIC_USEC_SWAPPED,
  RECORD_HEADER_SIZE
} from "./constants.js";
import { BadMagicError, OversizedRecordError, ShortReadError } from "./errors.js";
import type {
  PayloadLengthPolicy,
  PcapFileHeader,
  PcapReaderOptions,
  PcapTimestamp,
  PcapTimestampResolution
} from "./types.js";

const MAGIC_SIZE = 4;

/** Maps a magic number, decoded little-endian, to the byte order and resolution it announces. */
export const detectPcapMagic = (
  magic: number
): { littleEndian: boolean; timestampResolution: PcapTimestampResolution } | null => {
  if (magic === PCAP_MAGIC_USEC) return { littleEndian: true, timestampResolution: "microseconds" };
  if (magic === PCAP_MAGIC_NSEC) return { littleEndian: true, timestampResolution: "nanoseconds" };
  if (magic === PCAP_MAGIC_USEC_SWAPPED) return { littleEndian: false, timestampResolution: "microseconds" };
  if (magic === PCAP_MAGIC_NSEC_SWAPPED) return { littleEndian: false, timestampResolution: "nanoseconds" };
  return null;
};

type PacketRecordFields = {
  index: number;
  timestamp: PcapTimestamp;
  capturedLength: number;
  originalLength: number;
};

/**
 * One record read from a capture. The payload lives in a buffer borrowed
 * from the reader's pool; `release()` hands it back, `retain()` keeps it
 * alive past a `for await` iteration step.
 */
export class PcapPacket {
  readonly index: number;
  readonly timestamp: PcapTimestamp;
  readonly capturedLength: number;
  readonly originalLength: number;
  private readonly lease: BufferLease;

  constructor(fields: PacketRecordFields, lease: BufferLease) {
    this.index = fields.index;
    this.timestamp = fields.timestamp;
    this.capturedLength = fields.capturedLength;
    this.originalLength = fields.originalLength;
    this.lease = lease;
  }

  get released(): boolean {
    return this.lease.released;
  }

  /** The whole pooled buffer, `snaplen` bytes long. */
  get buffer(): Uint8Array {
    if (this.lease.released) throw new Error(`Packet #${this.index} buffer was already released.`);
    return this.lease.buffer;
  }

  /** The captured bytes of the record. */
  get data(): Uint8Array {
    return this.buffer.subarray(0, this.capturedLength);
  }

  get truncated(): boolean {
    return this.originalLength > this.capturedLength;
  }

  /** Copy of the captured bytes that does not depend on the pool. */
  detach(): Uint8Array {
    return this.data.slice();
  }

  retain(): void {
    this.lease.retain();
  }

  release(): void {
    this.lease.release();
  }
}

type ReaderFailure = { error: unknown };

export class PcapReader implements AsyncIterable<PcapPacket> {
  readonly header: PcapFileHeader;
  readonly pool: BufferPool;
  readonly payloadLength: PayloadLengthPolicy;
  private readonly source: ByteSource;
  private readonly recordHeader = new Uint8Array(RECORD_HEADER_SIZE);
  private failure: ReaderFailure | null = null;
  private ended = false;
  private reading = false;
  private count = 0;

  private constructor(source: ByteSource, header: PcapFileHeader, options: PcapReaderOptions) {
    this.source = source;
    this.header = header;
    this.payloadLength = options.payloadLength ?? "captured";
    this.pool = new BufferPool(header.snaplen);
  }

  /**
   * Reads and validates the file header. Rejects with `BadMagicError` when
   * the first four bytes are not a pcap magic number (nothing more is read),
   * or `ShortReadError` when the header is incomplete.
   */
  static async open(source: ByteSource, options: PcapReaderOptions = {}): Promise<PcapReader> {
    const magicBytes = new Uint8Array(MAGIC_SIZE);
    const magicRead = await readFully(source, magicBytes);
    if (magicRead < MAGIC_SIZE) throw new ShortReadError("file header", FILE_HEADER_SIZE, magicRead);

    const magicNumber = readUint32(magicBytes, 0, true);
    const magic = detectPcapMagic(magicNumber);
    if (!magic) throw new BadMagicError(magicNumber);

    const rest = new Uint8Array(FILE_HEADER_SIZE - MAGIC_SIZE);
    const restRead = await readFully(source, rest);
    if (restRead < rest.length) {
      throw new ShortReadError("file header", FILE_HEADER_SIZE, MAGIC_SIZE + restRead);
    }

    const le = magic.littleEndian;
    const header: PcapFileHeader = {
      magicNumber,
      littleEndian: le,
      timestampResolution: magic.timestampResolution,
      versionMajor: readUint16(rest, 0, le),
      versionMinor: readUint16(rest, 2, le),
      thiszone: readInt32(rest, 4, le),
      sigfigs: readUint32(rest, 8, le),
      snaplen: readUint32(rest, 12, le),
      linkType: readUint32(rest, 16, le)
    };
    return new PcapReader(source, header, options);
  }

  /** The error that stopped iteration, or null. */
  get error(): unknown {
    return this.failure ? this.failure.error : null;
  }

  get packetsRead(): number {
    return this.count;
  }

  get finished(): boolean {
    return this.ended || this.failure !== null;
  }

  /**
   * Resolves with the next packet, or null once the stream ends cleanly at a
   * record boundary. Any failure is kept and rethrown by every later call.
   */
  async next(): Promise<PcapPacket | null> {
    if (this.failure) throw this.failure.error;
    if (this.ended) return null;
    if (this.reading) throw new Error("PcapReader.next() called while a previous read is pending.");

    this.reading = true;
    try {
      const packet = await this.readPacket();
      if (packet) this.count += 1;
      else this.ended = true;
      return packet;
    } catch (error) {
      this.failure = { error };
      throw error;
    } finally {
      this.reading = false;
    }
  }

  /** Iterates the remaining packets, releasing each one when the loop moves past it. */
  async *packets(): AsyncGenerator<PcapPacket, void, undefined> {
    for (;;) {
      const packet = await this.next();
      if (!packet) return;
      try {
        yield packet;
      } finally {
        packet.release();
      }
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<PcapPacket, void, undefined> {
    return this.packets();
  }

  private async readPacket(): Promise<PcapPacket | null> {
    const index = this.count;
    const headerRead = await readFully(this.source, this.recordHeader);
    if (headerRead === 0) return null;
    if (headerRead < RECORD_HEADER_SIZE) {
      throw new ShortReadError(`packet #${index} record header`, RECORD_HEADER_SIZE, headerRead);
    }

    const le = this.header.littleEndian;
    const seconds = readUint32(this.recordHeader, 0, le);
    const fraction = readUint32(this.recordHeader, 4, le);
    const capturedLength = readUint32(this.recordHeader, 8, le);
    const originalLength = readUint32(this.recordHeader, 12, le);

    const { snaplen } = this.header;
    if (capturedLength > snaplen) throw new OversizedRecordError(index, capturedLength, snaplen);

    const lease = this.pool.acquire();
    const wanted = this.payloadLength === "snapshot" ? snaplen : capturedLength;
    let received: number;
    try {
      received = await readFully(this.source, lease.buffer.subarray(0, wanted));
    } catch (error) {
      lease.release();
      throw error;
    }
    if (received < wanted) {
      lease.release();
      throw new ShortReadError(`packet #${index} payload`, wanted, received);
    }
    // A reused buffer still holds the previous record past `wanted`.
    lease.buffer.fill(0, wanted);

    const nanoseconds =
      this.header.timestampResolution === "microseconds" ? fraction * NANOSECONDS_PER_MICROSECOND : fraction;
    return new PcapPacket({ index, timestamp: { seconds, nanoseconds }, capturedLength, originalLength }, lease);
  }
}
