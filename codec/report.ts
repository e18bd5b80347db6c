"use strict";

import { formatHumanSize, toHex32 } from "../binary-utils.js";
import { describeLinkType } from "./summary.js";
import type { PcapCaptureSummary, PcapFileHeader } from "./types.js";

const formatTimestampSeconds = (seconds: number | null): string => {
  if (seconds == null || !Number.isFinite(seconds) || seconds < 0) return "-";
  return new Date(seconds * 1000).toISOString();
};

const formatDurationSeconds = (seconds: number): string => {
  if (seconds < 0.001) return `${Math.round(seconds * 1_000_000)} µs`;
  if (seconds < 1) return `${Math.round(seconds * 1000)} ms`;
  if (seconds < 10) return `${Math.round(seconds * 1000) / 1000} s`;
  if (seconds < 600) return `${Math.round(seconds * 10) / 10} s`;
  const minutes = Math.floor(seconds / 60);
  const remaining = Math.round(seconds - minutes * 60);
  return `${minutes} min ${remaining} s`;
};

const formatRange = (min: number | null, max: number | null, average: number | null): string =>
  min == null || max == null ? "-" : `${min}..${max} (avg ${average ?? "-"})`;

/** Plain-text lines describing a capture header and its packet statistics. */
export const formatCaptureReport = (header: PcapFileHeader, summary: PcapCaptureSummary): string[] => {
  const lines: string[] = [];
  const linkName = describeLinkType(header.linkType) ?? `LinkType ${header.linkType}`;
  lines.push(`Magic: ${toHex32(header.magicNumber, 8)}`);
  lines.push(`Endianness: ${header.littleEndian ? "Little-endian" : "Big-endian"}`);
  lines.push(`Timestamp resolution: ${header.timestampResolution}`);
  lines.push(`Version: ${header.versionMajor}.${header.versionMinor}`);
  lines.push(`Time zone offset (thiszone): ${header.thiszone}`);
  lines.push(`Sigfigs: ${header.sigfigs}`);
  lines.push(`Snaplen: ${formatHumanSize(header.snaplen)}`);
  lines.push(`Link type: ${linkName} (${header.linkType})`);
  lines.push(`Packets: ${summary.totalPackets}`);
  lines.push(`Captured bytes: ${formatHumanSize(summary.totalCapturedBytes)}`);
  lines.push(`Original bytes: ${formatHumanSize(summary.totalOriginalBytes)}`);
  lines.push(
    `Captured length: ${formatRange(summary.capturedLengthMin, summary.capturedLengthMax, summary.capturedLengthAverage)}`
  );
  lines.push(
    `Original length: ${formatRange(summary.originalLengthMin, summary.originalLengthMax, summary.originalLengthAverage)}`
  );
  lines.push(`Truncated packets: ${summary.truncatedPackets}`);
  lines.push(`First packet: ${formatTimestampSeconds(summary.timestampMinSeconds)}`);
  lines.push(`Last packet: ${formatTimestampSeconds(summary.timestampMaxSeconds)}`);
  if (summary.timestampMinSeconds != null && summary.timestampMaxSeconds != null) {
    lines.push(`Duration: ${formatDurationSeconds(summary.timestampMaxSeconds - summary.timestampMinSeconds)}`);
  }
  if (summary.outOfOrderTimestamps > 0) {
    lines.push(`Out-of-order timestamps: ${summary.outOfOrderTimestamps}`);
  }
  return lines;
};
