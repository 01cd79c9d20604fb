import type { TidalTypes } from "@tidal/core";
import type { FileHandle } from "node:fs/promises";

/**
 * IReadable implementation for FileHandle.
 *
 * The array returned by `read()` is only valid until the next call, since the same memory is
 * reused for every read.
 */
export class FileHandleReadable implements TidalTypes.IReadable {
  #handle: FileHandle;
  #buffer = new ArrayBuffer(4096);

  constructor(handle: FileHandle) {
    this.#handle = handle;
  }

  async size(): Promise<number> {
    return (await this.#handle.stat()).size;
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    if (offset > Number.MAX_SAFE_INTEGER || length > Number.MAX_SAFE_INTEGER) {
      throw new Error(`Read too large: offset ${offset}, length ${length}`);
    }
    if (length > this.#buffer.byteLength) {
      this.#buffer = new ArrayBuffer(length * 2);
    }
    const result = await this.#handle.read({
      buffer: new Uint8Array(this.#buffer, 0, length),
      position: offset,
    });
    if (result.bytesRead !== length) {
      throw new Error(
        `Read only ${result.bytesRead} bytes from offset ${offset}, expected ${length}`,
      );
    }
    return new Uint8Array(this.#buffer, 0, result.bytesRead);
  }
}
