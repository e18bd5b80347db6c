"use strict";

export const FILE_HEADER_SIZE = 24;
export const RECORD_HEADER_SIZE = 16;

export const PCAP_MAGIC_USEC = 0xa1b2c3d4;
export const PCAP_MAGIC_NSEC = 0xa1b23c4d;
export const PCAP_MAGIC_USEC_SWAPPED = 0xd4c3b2a1;
export const PCAP_MAGIC_NSEC_SWAPPED = 0x4d3cb2a1;

export const NANOSECONDS_PER_MICROSECOND = 1000;
export const NANOSECONDS_PER_SECOND = 1_000_000_000;
