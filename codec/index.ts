"use strict";

export { BufferLease, BufferPool } from "./buffer-pool.js";
export {
  MemorySink,
  blobSource,
  bytesSource,
  fileHandleSink,
  fileHandleSource,
  readFully,
  readableSource,
  writableSink
} from "./byte-streams.js";
export type { BlobLike, ByteSink, ByteSource, FileHandleReader, FileHandleWriter } from "./byte-streams.js";
export * from "./constants.js";
export {
  BadMagicError,
  OversizedRecordError,
  PcapError,
  ShortReadError,
  ShortWriteError,
  isPcapError
} from "./errors.js";
export type { PcapErrorKind } from "./errors.js";
export { PcapPacket, PcapReader, detectPcapMagic } from "./reader.js";
export { formatCaptureReport } from "./report.js";
export { describeLinkType, summarizeCapture, timestampToSeconds } from "./summary.js";
export type {
  PayloadLengthPolicy,
  PcapCaptureSummary,
  PcapFileHeader,
  PcapPacketInput,
  PcapReaderOptions,
  PcapTimestamp,
  PcapTimestampResolution,
  PcapWriterHeader,
  PcapWriterOptions
} from "./types.js";
export { PcapWriter, encodeFileHeader } from "./writer.js";
