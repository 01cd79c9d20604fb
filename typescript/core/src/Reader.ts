import { NUL } from "./constants";
import { InvalidFormatError, TruncatedInputError } from "./errors";

// For performance reasons we use a single TextDecoder instance whose internal state is merely
// the encoding. This means that a TextDecoder.decode() call is not affected by previous calls.
// Fatal, so that malformed names fail instead of collapsing into U+FFFD.
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Sequential little-endian reader over a DataView. Every read checks bounds first and throws a
 * TruncatedInputError when the view ends before the value does.
 */
export default class Reader {
  #view: DataView;
  #viewU8: Uint8Array;
  #origin: number;
  offset: number;

  /**
   * @param origin Position of the first byte of `view` within the whole input, used for error
   * offsets.
   */
  constructor(view: DataView, offset = 0, origin = 0) {
    this.#view = view;
    this.#viewU8 = new Uint8Array(view.buffer, view.byteOffset, view.byteLength);
    this.#origin = origin;
    this.offset = offset;
  }

  /** Position of the read head within the whole input. */
  get position(): number {
    return this.#origin + this.offset;
  }

  bytesRemaining(): number {
    return this.#viewU8.length - this.offset;
  }

  uint8(): number {
    this.#ensure(1, "uint8");
    const value = this.#view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  uint32(): number {
    this.#ensure(4, "uint32");
    const value = this.#view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  uint64(): bigint {
    this.#ensure(8, "uint64");
    const value = this.#view.getBigUint64(this.offset, true);
    this.offset += 8;
    return value;
  }

  /** Read a NUL-terminated UTF-8 string, consuming the terminator. */
  string(): string {
    const end = this.#viewU8.indexOf(NUL, this.offset);
    if (end === -1) {
      throw new TruncatedInputError(
        `Unterminated string (${this.bytesRemaining()} bytes without NUL)`,
        this.position,
      );
    }
    let value: string;
    try {
      value = textDecoder.decode(this.#viewU8.subarray(this.offset, end));
    } catch (error) {
      if (error instanceof TypeError) {
        throw new InvalidFormatError("String is not valid UTF-8", this.position);
      }
      throw error;
    }
    this.offset = end + 1;
    return value;
  }

  // Read a copied Uint8Array from the underlying buffer, use when you need to keep the data around
  u8ArrayCopy(length: number): Uint8Array {
    this.#ensure(length, `${length} bytes`);
    const result = this.#viewU8.slice(this.offset, this.offset + length);
    this.offset += length;
    return result;
  }

  #ensure(length: number, what: string): void {
    if (length > this.bytesRemaining()) {
      throw new TruncatedInputError(
        `Expected ${what} but only ${this.bytesRemaining()} bytes remain`,
        this.position,
      );
    }
  }
}
