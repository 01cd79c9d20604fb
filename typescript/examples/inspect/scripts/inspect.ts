import { hasTidalMarker, isTidalError } from "@tidal/core";
import { decodeTidalFile } from "@tidal/nodejs";
import { program } from "commander";
import fs from "fs/promises";
import { performance } from "perf_hooks";

import { streamToCsv, summarizeLog } from "./format";
import { readStream } from "./readStream";

type InspectOptions = { fields: boolean; csv?: string; stream: boolean };

function log(...data: unknown[]) {
  console.log(...data);
}

function formatBytes(totalBytes: number) {
  const units = ["Bytes", "kiB", "MiB", "GiB", "TiB"];
  let bytes = totalBytes;
  let unit = 0;
  while (unit + 1 < units.length && bytes >= 1024) {
    bytes /= 1024;
    unit++;
  }
  return `${bytes.toFixed(2)}${units[unit] ?? ""}`;
}

async function inspect(filePath: string, options: InspectOptions) {
  const { size } = await fs.stat(filePath);
  if (size > 0) {
    const handle = await fs.open(filePath, "r");
    try {
      const buffer = new Uint8Array(1);
      const readResult = await handle.read({ buffer, offset: 0, length: 1 });
      if (!hasTidalMarker(new DataView(buffer.buffer, 0, readResult.bytesRead))) {
        throw new Error(
          `Not a TiDaL log: expected a metadata record first, found <${Array.from(buffer)
            .map((val) => val.toString(16).padStart(2, "0"))
            .join(" ")}>`,
        );
      }
    } finally {
      await handle.close();
    }
  }

  const startTime = performance.now();
  const decoded = options.stream ? await readStream(filePath) : await decodeTidalFile(filePath);
  const durationMs = performance.now() - startTime;

  if (options.csv != undefined) {
    const stream = decoded.get(options.csv);
    if (!stream) {
      throw new Error(`No stream named "${options.csv}" in ${filePath}`);
    }
    process.stdout.write(streamToCsv(stream));
    return;
  }

  log(`Read ${formatBytes(size)} from ${filePath} in ${durationMs.toFixed(2)}ms`);
  log(`${decoded.size} streams:`);
  for (const line of summarizeLog(decoded, { fields: options.fields })) {
    log(`  ${line}`);
  }
}

program
  .name("tidal-inspect")
  .argument("<file>", "path to a TiDaL log")
  .option("--fields", "list the fields or labels of each stream", false)
  .option("--csv <stream>", "write one stream to stdout as CSV")
  .option("--stream", "decode incrementally while reading the file", false)
  .action(async (file: string, options: InspectOptions) => {
    try {
      await inspect(file, options);
    } catch (error) {
      if (isTidalError(error)) {
        console.error(`${error.kind}: ${error.message}`);
      } else {
        console.error(error);
      }
      process.exitCode = 1;
    }
  })
  .parseAsync()
  .catch(console.error);
