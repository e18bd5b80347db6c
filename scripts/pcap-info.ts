"use strict";

import { open } from "node:fs/promises";
import { parseArgs } from "node:util";

import { PcapReader, fileHandleSource, formatCaptureReport, summarizeCapture } from "../codec/index.js";
import type { PayloadLengthPolicy } from "../codec/index.js";

const parsePolicy = (value: string | undefined): PayloadLengthPolicy => {
  if (value === undefined || value === "captured") return "captured";
  if (value === "snapshot") return "snapshot";
  throw new Error(`Unknown payload length policy: ${value} (expected "captured" or "snapshot")`);
};

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      "payload-length": { type: "string" }
    }
  });
  if (!positionals.length) {
    throw new Error("Usage: pcap-info [--payload-length captured|snapshot] <file.pcap>...");
  }
  const payloadLength = parsePolicy(values["payload-length"]);

  for (const path of positionals) {
    const handle = await open(path, "r");
    try {
      const reader = await PcapReader.open(fileHandleSource(handle), { payloadLength });
      const summary = await summarizeCapture(reader);
      console.log(path);
      for (const line of formatCaptureReport(reader.header, summary)) console.log(`  ${line}`);
      console.log(`  Payload buffers allocated: ${reader.pool.allocations}`);
    } finally {
      await handle.close();
    }
  }
}

void main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
