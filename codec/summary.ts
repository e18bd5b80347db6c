"use strict";

import { NANOSECONDS_PER_SECOND } from "./constants.js";
import type { PcapReader } from "./reader.js";
import type { PcapCaptureSummary, PcapTimestamp } from "./types.js";

export const describeLinkType = (linkType: number): string | null => {
  if (linkType === 0) return "Null/loopback";
  if (linkType === 1) return "Ethernet";
  if (linkType === 101) return "Raw IP";
  if (linkType === 105) return "IEEE 802.11";
  if (linkType === 113) return "Linux cooked capture";
  return null;
};

export const timestampToSeconds = (timestamp: PcapTimestamp): number =>
  timestamp.seconds + timestamp.nanoseconds / NANOSECONDS_PER_SECOND;

const roundAverage = (total: number, count: number): number => Math.round((total / count) * 100) / 100;

/** Drains `reader`, releasing every packet, and returns length and timestamp statistics. */
export const summarizeCapture = async (reader: PcapReader): Promise<PcapCaptureSummary> => {
  const summary: PcapCaptureSummary = {
    totalPackets: 0,
    totalCapturedBytes: 0,
    totalOriginalBytes: 0,
    capturedLengthMin: null,
    capturedLengthMax: null,
    capturedLengthAverage: null,
    originalLengthMin: null,
    originalLengthMax: null,
    originalLengthAverage: null,
    truncatedPackets: 0,
    timestampMinSeconds: null,
    timestampMaxSeconds: null,
    outOfOrderTimestamps: 0
  };
  let lastTimestamp: number | null = null;

  for await (const packet of reader) {
    const { capturedLength, originalLength } = packet;
    summary.totalPackets += 1;
    summary.totalCapturedBytes += capturedLength;
    summary.totalOriginalBytes += originalLength;

    if (summary.capturedLengthMin == null || capturedLength < summary.capturedLengthMin) {
      summary.capturedLengthMin = capturedLength;
    }
    if (summary.capturedLengthMax == null || capturedLength > summary.capturedLengthMax) {
      summary.capturedLengthMax = capturedLength;
    }
    if (summary.originalLengthMin == null || originalLength < summary.originalLengthMin) {
      summary.originalLengthMin = originalLength;
    }
    if (summary.originalLengthMax == null || originalLength > summary.originalLengthMax) {
      summary.originalLengthMax = originalLength;
    }
    if (packet.truncated) summary.truncatedPackets += 1;

    const seconds = timestampToSeconds(packet.timestamp);
    if (summary.timestampMinSeconds == null || seconds < summary.timestampMinSeconds) {
      summary.timestampMinSeconds = seconds;
    }
    if (summary.timestampMaxSeconds == null || seconds > summary.timestampMaxSeconds) {
      summary.timestampMaxSeconds = seconds;
    }
    if (lastTimestamp != null && seconds < lastTimestamp) summary.outOfOrderTimestamps += 1;
    lastTimestamp = seconds;
  }

  if (summary.totalPackets > 0) {
    summary.capturedLengthAverage = roundAverage(summary.totalCapturedBytes, summary.totalPackets);
    summary.originalLengthAverage = roundAverage(summary.totalOriginalBytes, summary.totalPackets);
  }
  return summary;
};
