"use strict";

import { writeInt32LE, writeUint16LE, writeUint32LE } from "../binary-utils.js";
import type { ByteSink } from "./byte-streams.js";
import {
  FILE_HEADER_SIZE,
  NANOSECONDS_PER_MICROSECOND,
  PCAP_MAGIC_NSEC,
  PCAP_MAGIC_USEC,
  RECORD_HEADER_SIZE
} from "./constants.js";
import { ShortWriteError } from "./errors.js";
import type { PayloadLengthPolicy, PcapPacketInput, PcapWriterHeader, PcapWriterOptions } from "./types.js";

const assertU32 = (value: number, what: string): void => {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) {
    throw new RangeError(`${what} must fit in u32: ${value}`);
  }
};

const assertU16 = (value: number, what: string): void => {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new RangeError(`${what} must fit in u16: ${value}`);
  }
};

const assertI32 = (value: number, what: string): void => {
  if (!Number.isInteger(value) || value < -0x8000_0000 || value > 0x7fff_ffff) {
    throw new RangeError(`${what} must fit in i32: ${value}`);
  }
};

export const encodeFileHeader = (header: PcapWriterHeader): Uint8Array => {
  assertU16(header.versionMajor, "versionMajor");
  assertU16(header.versionMinor, "versionMinor");
  assertI32(header.thiszone, "thiszone");
  assertU32(header.sigfigs, "sigfigs");
  assertU32(header.snaplen, "snaplen");
  assertU32(header.linkType, "linkType");

  const bytes = new Uint8Array(FILE_HEADER_SIZE);
  const magic = header.timestampResolution === "nanoseconds" ? PCAP_MAGIC_NSEC : PCAP_MAGIC_USEC;
  writeUint32LE(bytes, 0, magic);
  writeUint16LE(bytes, 4, header.versionMajor);
  writeUint16LE(bytes, 6, header.versionMinor);
  writeInt32LE(bytes, 8, header.thiszone);
  writeUint32LE(bytes, 12, header.sigfigs);
  writeUint32LE(bytes, 16, header.snaplen);
  writeUint32LE(bytes, 20, header.linkType);
  return bytes;
};

const writeAll = async (sink: ByteSink, bytes: Uint8Array, what: string): Promise<void> => {
  let written: number;
  try {
    written = await sink.write(bytes);
  } catch (error) {
    throw new ShortWriteError(what, bytes.length, 0, { cause: error });
  }
  if (written < bytes.length) throw new ShortWriteError(what, bytes.length, written);
};

type WriterFailure = { error: unknown };

/**
 * Serializes a capture to a sink, always little-endian. The file header is
 * written by `create`; each `write` emits one record header and its payload.
 * A failed write is not retried or rolled back, and every later write
 * rethrows it.
 */
export class PcapWriter {
  readonly header: PcapWriterHeader;
  readonly payloadLength: PayloadLengthPolicy;
  private readonly sink: ByteSink;
  private failure: WriterFailure | null = null;
  private writing = false;
  private packets = 0;
  private bytes = 0;

  private constructor(sink: ByteSink, header: PcapWriterHeader, options: PcapWriterOptions) {
    this.sink = sink;
    this.header = {
      timestampResolution: header.timestampResolution,
      versionMajor: header.versionMajor,
      versionMinor: header.versionMinor,
      thiszone: header.thiszone,
      sigfigs: header.sigfigs,
      snaplen: header.snaplen,
      linkType: header.linkType
    };
    this.payloadLength = options.payloadLength ?? "captured";
  }

  static async create(
    sink: ByteSink,
    header: PcapWriterHeader,
    options: PcapWriterOptions = {}
  ): Promise<PcapWriter> {
    const encoded = encodeFileHeader(header);
    await writeAll(sink, encoded, "file header");
    const writer = new PcapWriter(sink, header, options);
    writer.bytes = encoded.length;
    return writer;
  }

  get packetsWritten(): number {
    return this.packets;
  }

  get bytesWritten(): number {
    return this.bytes;
  }

  get error(): unknown {
    return this.failure ? this.failure.error : null;
  }

  async write(packet: PcapPacketInput): Promise<void> {
    if (this.failure) throw this.failure.error;
    if (this.writing) throw new Error("PcapWriter.write() called while a previous write is pending.");

    const index = this.packets;
    const { recordHeader, payload } = this.encodePacket(packet, index);

    this.writing = true;
    try {
      await writeAll(this.sink, recordHeader, `packet #${index} record header`);
      this.bytes += recordHeader.length;
      await writeAll(this.sink, payload, `packet #${index} payload`);
      this.bytes += payload.length;
      this.packets += 1;
    } catch (error) {
      this.failure = { error };
      throw error;
    } finally {
      this.writing = false;
    }
  }

  private encodePacket(
    packet: PcapPacketInput,
    index: number
  ): { recordHeader: Uint8Array; payload: Uint8Array } {
    const { data, timestamp } = packet;
    const capturedLength = packet.capturedLength ?? data.length;
    const originalLength = packet.originalLength ?? capturedLength;
    const { snaplen } = this.header;

    assertU32(timestamp.seconds, `packet #${index} timestamp seconds`);
    assertU32(capturedLength, `packet #${index} capturedLength`);
    assertU32(originalLength, `packet #${index} originalLength`);
    if (capturedLength > data.length) {
      throw new RangeError(
        `packet #${index} capturedLength (${capturedLength}) exceeds its data (${data.length} bytes)`
      );
    }
    if (capturedLength > snaplen) {
      throw new RangeError(`packet #${index} capturedLength (${capturedLength}) exceeds snaplen (${snaplen})`);
    }

    if (!Number.isInteger(timestamp.nanoseconds) || timestamp.nanoseconds < 0 || timestamp.nanoseconds > 999_999_999) {
      throw new RangeError(`packet #${index} timestamp nanoseconds must be within one second: ${timestamp.nanoseconds}`);
    }
    const fraction =
      this.header.timestampResolution === "microseconds"
        ? Math.floor(timestamp.nanoseconds / NANOSECONDS_PER_MICROSECOND)
        : timestamp.nanoseconds;
    assertU32(fraction, `packet #${index} timestamp fraction`);

    const recordHeader = new Uint8Array(RECORD_HEADER_SIZE);
    writeUint32LE(recordHeader, 0, timestamp.seconds);
    writeUint32LE(recordHeader, 4, fraction);
    writeUint32LE(recordHeader, 8, capturedLength);
    writeUint32LE(recordHeader, 12, originalLength);

    if (this.payloadLength === "captured") {
      return { recordHeader, payload: data.subarray(0, capturedLength) };
    }
    // `buffer` is only trusted as a whole; anything else is padded with zeros.
    const backing = packet.buffer ?? data.subarray(0, capturedLength);
    if (backing.length >= snaplen) return { recordHeader, payload: backing.subarray(0, snaplen) };
    const padded = new Uint8Array(snaplen);
    padded.set(backing);
    return { recordHeader, payload: padded };
  }
}
