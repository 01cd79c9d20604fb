/**
 * A growable buffer for use when processing a stream of data. Bytes are appended at the end as
 * they arrive and consumed from the front once a complete record has been parsed.
 */
export default class StreamBuffer {
  #buffer: ArrayBuffer;
  #consumed = 0;
  view: DataView;

  constructor(initialCapacity = 0) {
    this.#buffer = new ArrayBuffer(initialCapacity);
    this.view = new DataView(this.#buffer, 0, 0);
  }

  bytesRemaining(): number {
    return this.view.byteLength;
  }

  /** Total number of bytes consumed since construction, i.e. the input offset of `view`. */
  bytesConsumed(): number {
    return this.#consumed;
  }

  /** Mark some data as consumed, so the memory can be reused when new data is appended. */
  consume(count: number): void {
    this.view = new DataView(
      this.#buffer,
      this.view.byteOffset + count,
      this.view.byteLength - count,
    );
    this.#consumed += count;
  }

  /** Add data to the buffer, shifting existing data or reallocating if necessary. */
  append(data: Uint8Array): void {
    const length = this.view.byteLength + data.byteLength;
    if (this.view.byteOffset + length <= this.#buffer.byteLength) {
      // fits by appending only
      new Uint8Array(this.#buffer, this.view.byteOffset).set(data, this.view.byteLength);
      this.view = new DataView(this.#buffer, this.view.byteOffset, length);
      return;
    }

    const oldData = new Uint8Array(this.#buffer, this.view.byteOffset, this.view.byteLength);
    if (length > this.#buffer.byteLength) {
      this.#buffer = new ArrayBuffer(length * 2);
    }
    // copyWithin handles the overlap when existing data moves to the start of the same buffer
    const array = new Uint8Array(this.#buffer);
    if (oldData.buffer === this.#buffer) {
      array.copyWithin(0, oldData.byteOffset, oldData.byteOffset + oldData.byteLength);
    } else {
      array.set(oldData, 0);
    }
    array.set(data, oldData.byteLength);
    this.view = new DataView(this.#buffer, 0, length);
  }
}
