import { TidalDecoder } from "./TidalDecoder";
import TidalStreamReader from "./TidalStreamReader";
import { SourceUnavailableError } from "./errors";
import { DecodedLog, IReadable } from "./types";

export type DecodeReadableOptions = {
  /** Number of bytes requested from the readable per read */
  chunkSize?: number;
  /** Name of the source used in SourceUnavailableError, such as a file path */
  sourceName?: string;
};

/**
 * Decode a log by reading `readable` from start to end in chunks. Failures of the readable itself
 * are reported as SourceUnavailableError; format errors propagate unchanged.
 */
export async function decodeReadable(
  readable: IReadable,
  { chunkSize = 1024 * 1024, sourceName = "readable" }: DecodeReadableOptions = {},
): Promise<DecodedLog> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Invalid chunk size ${chunkSize}`);
  }
  const reader = new TidalStreamReader();
  const decoder = new TidalDecoder();

  let size: number;
  try {
    size = await readable.size();
  } catch (error) {
    throw new SourceUnavailableError(sourceName, error);
  }

  for (let offset = 0; offset < size; offset += chunkSize) {
    const length = Math.min(chunkSize, size - offset);
    let chunk: Uint8Array;
    try {
      chunk = await readable.read(offset, length);
    } catch (error) {
      throw new SourceUnavailableError(sourceName, error);
    }
    if (chunk.byteLength !== length) {
      throw new SourceUnavailableError(
        sourceName,
        new Error(`Read ${chunk.byteLength} bytes from offset ${offset}, expected ${length}`),
      );
    }
    reader.append(chunk);
    for (let record; (record = reader.nextRecord()); ) {
      decoder.handleRecord(record);
    }
  }

  reader.end();
  for (let record; (record = reader.nextRecord()); ) {
    decoder.handleRecord(record);
  }
  return decoder.finish();
}
