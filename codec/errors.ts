"use strict";

import { toHex32 } from "../binary-utils.js";

export type PcapErrorKind = "bad-magic" | "short-read" | "oversized-record" | "short-write";

export class PcapError extends Error {
  readonly kind: PcapErrorKind;

  constructor(kind: PcapErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PcapError";
    this.kind = kind;
  }
}

export class BadMagicError extends PcapError {
  readonly magic: number;

  constructor(magic: number) {
    super("bad-magic", `pcap: bad magic number ${toHex32(magic, 8)}`);
    this.name = "BadMagicError";
    this.magic = magic;
  }
}

export class ShortReadError extends PcapError {
  readonly what: string;
  readonly expected: number;
  readonly received: number;

  constructor(what: string, expected: number, received: number) {
    super("short-read", `pcap: short read in ${what} (${received}/${expected} bytes)`);
    this.name = "ShortReadError";
    this.what = what;
    this.expected = expected;
    this.received = received;
  }
}

export class OversizedRecordError extends PcapError {
  readonly capturedLength: number;
  readonly snaplen: number;

  constructor(packetIndex: number, capturedLength: number, snaplen: number) {
    super(
      "oversized-record",
      `pcap: packet #${packetIndex} captured length (${capturedLength}) exceeds snaplen (${snaplen})`
    );
    this.name = "OversizedRecordError";
    this.capturedLength = capturedLength;
    this.snaplen = snaplen;
  }
}

export class ShortWriteError extends PcapError {
  readonly expected: number;
  readonly written: number;

  constructor(what: string, expected: number, written: number, options?: ErrorOptions) {
    super("short-write", `pcap: short write in ${what} (${written}/${expected} bytes)`, options);
    this.name = "ShortWriteError";
    this.expected = expected;
    this.written = written;
  }
}

export const isPcapError = (value: unknown): value is PcapError => value instanceof PcapError;
