import { TidalTypes, SourceUnavailableError, decodeReadable } from "@tidal/core";
import { FileHandle, open } from "node:fs/promises";

import { FileHandleReadable } from "./FileHandleReadable";

export type DecodeFileOptions = {
  /** Number of bytes read from the file at a time */
  chunkSize?: number;
};

/**
 * Decode the log file at `filePath`.
 *
 * Throws SourceUnavailableError when the file cannot be opened or read, and the format errors of
 * `decodeTidal` when its content is malformed.
 */
export async function decodeTidalFile(
  filePath: string,
  { chunkSize }: DecodeFileOptions = {},
): Promise<TidalTypes.DecodedLog> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, "r");
  } catch (error) {
    throw new SourceUnavailableError(filePath, error);
  }
  try {
    return await decodeReadable(new FileHandleReadable(handle), {
      chunkSize,
      sourceName: filePath,
    });
  } finally {
    await handle.close();
  }
}
