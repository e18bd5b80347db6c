"use strict";

const viewOf = (bytes: Uint8Array): DataView =>
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

export const readUint32 = (bytes: Uint8Array, offset: number, littleEndian: boolean): number =>
  viewOf(bytes).getUint32(offset, littleEndian);

export const readUint16 = (bytes: Uint8Array, offset: number, littleEndian: boolean): number =>
  viewOf(bytes).getUint16(offset, littleEndian);

export const readInt32 = (bytes: Uint8Array, offset: number, littleEndian: boolean): number =>
  viewOf(bytes).getInt32(offset, littleEndian);

export const writeUint32LE = (bytes: Uint8Array, offset: number, value: number): void => {
  viewOf(bytes).setUint32(offset, value, true);
};

export const writeUint16LE = (bytes: Uint8Array, offset: number, value: number): void => {
  viewOf(bytes).setUint16(offset, value, true);
};

export const writeInt32LE = (bytes: Uint8Array, offset: number, value: number): void => {
  viewOf(bytes).setInt32(offset, value, true);
};

export const toHex32 = (value: number, width = 0): string => {
  const masked = Number(value >>> 0);
  return "0x" + masked.toString(16).padStart(width, "0");
};

export const formatHumanSize = (byteCount: number): string => {
  const base = 1024;
  const units = ["B", "KB", "MB", "GB", "TB"];
  let unitIndex = 0;
  let value = byteCount;
  while (value >= base && unitIndex < units.length - 1) {
    value /= base;
    unitIndex += 1;
  }
  const roundedValue = value >= 100 ? Math.round(value) : Math.round(value * 10) / 10;
  return `${roundedValue} ${units[unitIndex]} (${byteCount} bytes)`;
};

export const concatBytes = (parts: Uint8Array[]): Uint8Array => {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let cursor = 0;
  for (const part of parts) {
    out.set(part, cursor);
    cursor += part.length;
  }
  return out;
};
