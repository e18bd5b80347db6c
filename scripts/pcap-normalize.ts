"use strict";

import { open } from "node:fs/promises";
import { parseArgs } from "node:util";

import { PcapReader, PcapWriter, fileHandleSink, fileHandleSource } from "../codec/index.js";

async function main(): Promise<void> {
  const { positionals } = parseArgs({ allowPositionals: true });
  const [inputPath, outputPath] = positionals;
  if (!inputPath || !outputPath) {
    throw new Error("Usage: pcap-normalize <input.pcap> <output.pcap>");
  }

  const input = await open(inputPath, "r");
  try {
    const output = await open(outputPath, "w");
    try {
      const reader = await PcapReader.open(fileHandleSource(input));
      const writer = await PcapWriter.create(fileHandleSink(output), reader.header);
      for await (const packet of reader) await writer.write(packet);
      console.log(
        `Wrote ${writer.packetsWritten} packets (${writer.bytesWritten} bytes) from ` +
          `${reader.header.littleEndian ? "little" : "big"}-endian ${inputPath} to ${outputPath}`
      );
    } finally {
      await output.close();
    }
  } finally {
    await input.close();
  }
}

void main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
