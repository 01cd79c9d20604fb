import { BufferBuilder } from "./BufferBuilder";
import Reader from "./Reader";
import { InvalidFormatError, StreamNotFoundError, TruncatedInputError } from "./errors";
import { finalizeStream } from "./finalize";
import { labelCount } from "./layout";
import { parseRecord } from "./parse";
import { DecodedLog, Layout, TypedTidalRecord } from "./types";

type StreamState = {
  name: string;
  layout: Layout;
  labels: string[] | undefined;
  timestamps: BufferBuilder;
  samples: BufferBuilder;
  recordCount: number;
};

/**
 * Accumulates the records of one log and produces the decoded streams. All state lives in the
 * decoder instance; use a new decoder for every log.
 *
 * Redeclaring a stream id replaces its layout and discards the samples collected so far.
 */
export class TidalDecoder {
  #streams = new Map<number, StreamState>();
  #initialStreamCapacity: number;

  /** @param initialStreamCapacity Initial size in bytes of each per-stream sample buffer */
  constructor({ initialStreamCapacity = 1024 }: { initialStreamCapacity?: number } = {}) {
    this.#initialStreamCapacity = initialStreamCapacity;
  }

  /** Layout of a declared stream, for use as the `getLayout` argument of `parseRecord`. */
  getLayout = (streamId: number): Layout | undefined => {
    return this.#streams.get(streamId)?.layout;
  };

  handleRecord(record: TypedTidalRecord): void {
    switch (record.type) {
      case "Metadata":
        this.#streams.set(record.streamId, {
          name: record.name,
          layout: record.layout,
          labels: undefined,
          timestamps: new BufferBuilder(this.#initialStreamCapacity),
          samples: new BufferBuilder(this.#initialStreamCapacity),
          recordCount: 0,
        });
        break;

      case "Labels": {
        const stream = this.#streams.get(record.streamId);
        if (!stream) {
          throw new StreamNotFoundError(record.streamId, "Labels");
        }
        const expected = labelCount(stream.layout);
        if (record.labels.length !== expected) {
          throw new InvalidFormatError(
            `Stream ${record.streamId} (${stream.name}) expects ${expected} labels, got ${record.labels.length}`,
          );
        }
        stream.labels = record.labels;
        break;
      }

      case "Data": {
        const stream = this.#streams.get(record.streamId);
        if (!stream) {
          throw new StreamNotFoundError(record.streamId, "Data");
        }
        if (record.payload.byteLength !== stream.layout.byteSize) {
          throw new TruncatedInputError(
            `Stream ${record.streamId} (${stream.name}) sample has ${record.payload.byteLength} bytes, expected ${stream.layout.byteSize}`,
          );
        }
        stream.timestamps.uint64(record.timestamp);
        stream.samples.bytes(record.payload);
        stream.recordCount++;
        break;
      }
    }
  }

  /** Materialize every declared stream. A name shared by two stream ids goes to the later one. */
  finish(): DecodedLog {
    const log: DecodedLog = new Map();
    for (const [id, stream] of this.#streams) {
      log.set(
        stream.name,
        finalizeStream({
          id,
          name: stream.name,
          layout: stream.layout,
          labels: stream.labels,
          timestampBytes: stream.timestamps.bufferView(),
          sampleBytes: stream.samples.bufferView(),
          recordCount: stream.recordCount,
        }),
      );
    }
    return log;
  }
}

/**
 * Decode a complete log held in memory.
 *
 * Throws InvalidFormatError, StreamNotFoundError or TruncatedInputError when the log is malformed.
 */
export function decodeTidal(data: Uint8Array): DecodedLog {
  const reader = new Reader(new DataView(data.buffer, data.byteOffset, data.byteLength));
  const decoder = new TidalDecoder();
  for (let record; (record = parseRecord(reader, decoder.getLayout)); ) {
    decoder.handleRecord(record);
  }
  return decoder.finish();
}
