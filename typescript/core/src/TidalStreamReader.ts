import Reader from "./Reader";
import StreamBuffer from "./StreamBuffer";
import { TruncatedInputError } from "./errors";
import { parseRecord } from "./parse";
import { Layout, TypedTidalRecord } from "./types";

export type TidalReaderOptions = {
  /** Initial capacity in bytes of the buffer holding a partially received record. */
  initialBufferSize?: number;
};

/**
 * A streaming reader for TiDaL log files.
 *
 * Usage example:
 * ```
 * const reader = new TidalStreamReader();
 * stream.on("data", (data) => {
 *   reader.append(data);
 *   for (let record; (record = reader.nextRecord()); ) {
 *     // process available records
 *   }
 * });
 * stream.on("end", () => {
 *   reader.end();
 *   for (let record; (record = reader.nextRecord()); ) {
 *     // process the remaining records
 *   }
 * });
 * ```
 */
export default class TidalStreamReader {
  #buffer: StreamBuffer;
  #ended = false;
  #layoutsById = new Map<number, Layout>();

  constructor({ initialBufferSize = 4096 }: TidalReaderOptions = {}) {
    this.#buffer = new StreamBuffer(initialBufferSize);
  }

  /** @returns True once `end()` has been called and every received byte has been parsed. */
  done(): boolean {
    return this.#ended && this.#buffer.bytesRemaining() === 0;
  }

  /** @returns The number of bytes that have been received by `append()` but not yet parsed. */
  bytesRemaining(): number {
    return this.#buffer.bytesRemaining();
  }

  /**
   * Provide the reader with newly received bytes for it to process. After calling this function,
   * call `nextRecord()` again to parse any records that are now available.
   */
  append(data: Uint8Array): void {
    if (this.#ended) {
      throw new Error("Already ended");
    }
    this.#buffer.append(data);
  }

  /**
   * Signal that no more data will be appended. A record still incomplete at this point makes the
   * next call to `nextRecord()` throw a TruncatedInputError.
   */
  end(): void {
    this.#ended = true;
  }

  /**
   * Read the next record from the stream if possible. Returns undefined when not enough data is
   * available to parse a complete record, or when all input has been read.
   *
   * This function may throw any errors encountered during parsing. If an error is thrown, the
   * reader is in an unspecified state and should no longer be used.
   */
  nextRecord(): TypedTidalRecord | undefined {
    const reader = new Reader(this.#buffer.view, 0, this.#buffer.bytesConsumed());
    let record: TypedTidalRecord | undefined;
    try {
      record = parseRecord(reader, (streamId) => this.#layoutsById.get(streamId));
    } catch (error) {
      if (error instanceof TruncatedInputError && !this.#ended) {
        // the rest of the record has not arrived yet
        return undefined;
      }
      throw error;
    }
    if (!record) {
      return undefined;
    }
    this.#buffer.consume(reader.offset);

    if (record.type === "Metadata") {
      this.#layoutsById.set(record.streamId, record.layout);
    }
    return record;
  }
}
