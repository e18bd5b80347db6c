"use strict";

export type PcapTimestampResolution = "microseconds" | "nanoseconds";

export type PayloadLengthPolicy = "captured" | "snapshot";

export type PcapFileHeader = {
  magicNumber: number;
  littleEndian: boolean;
  timestampResolution: PcapTimestampResolution;
  versionMajor: number;
  versionMinor: number;
  thiszone: number;
  sigfigs: number;
  snaplen: number;
  linkType: number;
};

// What the writer needs; byte order and magic are fixed by the output format.
export type PcapWriterHeader = Omit<PcapFileHeader, "magicNumber" | "littleEndian">;

export type PcapTimestamp = {
  seconds: number;
  nanoseconds: number;
};

export type PcapPacketInput = {
  timestamp: PcapTimestamp;
  data: Uint8Array;
  capturedLength?: number;
  originalLength?: number;
  // Full backing buffer; written instead of `data` under the "snapshot" policy.
  buffer?: Uint8Array;
};

export type PcapReaderOptions = {
  payloadLength?: PayloadLengthPolicy;
};

export type PcapWriterOptions = {
  payloadLength?: PayloadLengthPolicy;
};

export type PcapCaptureSummary = {
  totalPackets: number;
  totalCapturedBytes: number;
  totalOriginalBytes: number;
  capturedLengthMin: number | null;
  capturedLengthMax: number | null;
  capturedLengthAverage: number | null;
  originalLengthMin: number | null;
  originalLengthMax: number | null;
  originalLengthAverage: number | null;
  truncatedPackets: number;
  timestampMinSeconds: number | null;
  timestampMaxSeconds: number | null;
  outOfOrderTimestamps: number;
};
