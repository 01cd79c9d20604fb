import type { IWritable } from "./IWritable";
import type { IReadable } from "./types";

/** An in-memory log destination and source. */
export class TempBuffer implements IReadable, IWritable {
  #buffer = new ArrayBuffer(1024);
  #size = 0;

  async write(data: Uint8Array): Promise<void> {
    if (this.#size + data.byteLength > this.#buffer.byteLength) {
      const newBuffer = new ArrayBuffer(Math.max(this.#size + data.byteLength, this.#size * 2));
      new Uint8Array(newBuffer).set(new Uint8Array(this.#buffer, 0, this.#size));
      this.#buffer = newBuffer;
    }
    new Uint8Array(this.#buffer, this.#size).set(data);
    this.#size += data.byteLength;
  }

  async size(): Promise<number> {
    return this.#size;
  }

  async read(offset: number, size: number): Promise<Uint8Array> {
    if (offset < 0 || size < 0 || offset + size > this.#size) {
      throw new Error(`read out of range: offset ${offset}, size ${size}`);
    }
    return new Uint8Array(this.#buffer, offset, size);
  }

  /** The bytes written so far (not a copy). */
  get(): Uint8Array {
    return new Uint8Array(this.#buffer, 0, this.#size);
  }
}
