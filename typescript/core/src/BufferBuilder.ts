import { NUL } from "./constants";

const LITTLE_ENDIAN = true;

/**
 * BufferBuilder provides methods to create a buffer from primitive values. The buffer grows as
 * needed.
 *
 * Each method on buffer builder appends the value to the end of the buffer.
 *
 * A buffer can be reset to re-use the underlying memory and start writing at the start of the buffer.
 */
export class BufferBuilder {
  #fullBuffer: Uint8Array;
  #view: DataView;
  #textEncoder = new TextEncoder();

  // location of the write head - new writes will start here
  #offset = 0;

  constructor(initialCapacity = 4096) {
    this.#fullBuffer = new Uint8Array(initialCapacity);
    this.#view = new DataView(this.#fullBuffer.buffer);
  }

  /**
   * Length in bytes of the written buffer
   */
  get length(): number {
    return this.#offset;
  }

  /** Returns a copy of the written data. */
  get buffer(): Uint8Array {
    return this.#fullBuffer.slice(0, this.#offset);
  }

  /** Returns a temporary view of the written data (not a copy). */
  bufferView(): Uint8Array {
    return this.#fullBuffer.subarray(0, this.#offset);
  }

  int8(value: number): this {
    this.#ensureAdditionalCapacity(1);
    this.#view.setInt8(this.#offset, value);
    this.#offset += 1;
    return this;
  }
  uint8(value: number): this {
    this.#ensureAdditionalCapacity(1);
    this.#view.setUint8(this.#offset, value);
    this.#offset += 1;
    return this;
  }
  int16(value: number): this {
    this.#ensureAdditionalCapacity(2);
    this.#view.setInt16(this.#offset, value, LITTLE_ENDIAN);
    this.#offset += 2;
    return this;
  }
  uint16(value: number): this {
    this.#ensureAdditionalCapacity(2);
    this.#view.setUint16(this.#offset, value, LITTLE_ENDIAN);
    this.#offset += 2;
    return this;
  }
  int32(value: number): this {
    this.#ensureAdditionalCapacity(4);
    this.#view.setInt32(this.#offset, value, LITTLE_ENDIAN);
    this.#offset += 4;
    return this;
  }
  uint32(value: number): this {
    this.#ensureAdditionalCapacity(4);
    this.#view.setUint32(this.#offset, value, LITTLE_ENDIAN);
    this.#offset += 4;
    return this;
  }
  int64(value: number | bigint): this {
    const bigIntValue = typeof value === "number" ? BigInt(value) : value;
    this.#ensureAdditionalCapacity(8);
    this.#view.setBigInt64(this.#offset, bigIntValue, LITTLE_ENDIAN);
    this.#offset += 8;
    return this;
  }
  uint64(value: number | bigint): this {
    const bigIntValue = typeof value === "number" ? BigInt(value) : value;
    this.#ensureAdditionalCapacity(8);
    this.#view.setBigUint64(this.#offset, bigIntValue, LITTLE_ENDIAN);
    this.#offset += 8;
    return this;
  }
  float32(value: number): this {
    this.#ensureAdditionalCapacity(4);
    this.#view.setFloat32(this.#offset, value, LITTLE_ENDIAN);
    this.#offset += 4;
    return this;
  }
  float64(value: number): this {
    this.#ensureAdditionalCapacity(8);
    this.#view.setFloat64(this.#offset, value, LITTLE_ENDIAN);
    this.#offset += 8;
    return this;
  }
  /** Append the UTF-8 bytes of `value` followed by a NUL terminator. */
  cstring(value: string): this {
    const stringBytes = this.#textEncoder.encode(value);
    if (stringBytes.includes(NUL)) {
      throw new Error(`String ${JSON.stringify(value)} contains a NUL character`);
    }
    this.#ensureAdditionalCapacity(stringBytes.byteLength + 1);
    this.#fullBuffer.set(stringBytes, this.#offset);
    this.#offset += stringBytes.length;
    this.#view.setUint8(this.#offset, NUL);
    this.#offset += 1;
    return this;
  }
  bytes(buffer: Uint8Array): this {
    this.#ensureAdditionalCapacity(buffer.byteLength);
    this.#fullBuffer.set(buffer, this.#offset);
    this.#offset += buffer.length;
    return this;
  }

  /**
   * reset the write head to the start of the buffer
   */
  reset(): this {
    this.#offset = 0;
    return this;
  }

  #ensureAdditionalCapacity(capacity: number): void {
    this.#ensureCapacity(this.#offset + capacity);
  }

  #ensureCapacity(capacity: number): void {
    if (capacity > this.#fullBuffer.byteLength) {
      const newSize = Math.max(Math.ceil(this.#fullBuffer.byteLength * 1.5), capacity);
      const newBuffer = new Uint8Array(newSize);
      newBuffer.set(this.#fullBuffer);

      this.#fullBuffer = newBuffer;
      this.#view = new DataView(this.#fullBuffer.buffer);
    }
  }
}
