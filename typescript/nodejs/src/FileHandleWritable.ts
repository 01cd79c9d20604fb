import type { IWritable } from "@tidal/core";
import type { FileHandle } from "node:fs/promises";

/**
 * IWritable implementation for FileHandle.
 */
export class FileHandleWritable implements IWritable {
  #handle: FileHandle;
  #totalBytesWritten = 0;

  constructor(handle: FileHandle) {
    this.#handle = handle;
  }

  async write(buffer: Uint8Array): Promise<void> {
    let offset = 0;
    while (offset < buffer.byteLength) {
      const { bytesWritten } = await this.#handle.write(buffer, offset);
      offset += bytesWritten;
    }
    this.#totalBytesWritten += offset;
  }

  /** Number of bytes written through this writable */
  bytesWritten(): number {
    return this.#totalBytesWritten;
  }
}
