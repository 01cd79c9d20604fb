import { BufferBuilder } from "./BufferBuilder";
import type { IWritable } from "./IWritable";
import { TidalRecordBuilder } from "./TidalRecordBuilder";
import { writeMatrixSample, writeScalarSample, writeVectorSample } from "./encodeSample";
import { labelCount, matrixLayout, scalarLayout, vectorLayout } from "./layout";
import type { Layout, ScalarType, ScalarValue } from "./types";

const MAX_UINT32 = 0xffffffff;
const MAX_UINT64 = 0xffffffffffffffffn;

export type TidalWriterOptions = {
  writable: IWritable;
  /** Id of the first stream added; later streams count up from here */
  startStreamId?: number;
};

/**
 * TidalWriter provides an interface for writing log streams and samples.
 *
 * NOTE: callers must wait on any method call to complete before calling another
 * method. Calling a method before another has completed will result in a corrupt
 * log.
 */
export class TidalWriter {
  #writable: IWritable;
  #nextStreamId: number;
  #recordBuilder = new TidalRecordBuilder();
  #payloadBuilder = new BufferBuilder(256);
  #streams = new Map<number, { name: string; layout: Layout }>();

  constructor({ writable, startStreamId = 0 }: TidalWriterOptions) {
    if (!Number.isInteger(startStreamId) || startStreamId < 0 || startStreamId > MAX_UINT32) {
      throw new RangeError(`Invalid start stream id ${startStreamId}`);
    }
    this.#writable = writable;
    this.#nextStreamId = startStreamId;
  }

  /** Declare a stream whose samples are records of `fields.length` values. */
  async addScalarStream(name: string, fields: ScalarType[]): Promise<number> {
    return await this.#addStream(name, scalarLayout([...fields]));
  }

  async addVectorStream(name: string, scalarType: ScalarType, length: number): Promise<number> {
    checkDimension(length, "length");
    return await this.#addStream(name, vectorLayout(scalarType, length));
  }

  async addMatrixStream(
    name: string,
    scalarType: ScalarType,
    rows: number,
    cols: number,
  ): Promise<number> {
    checkDimension(rows, "rows");
    checkDimension(cols, "cols");
    return await this.#addStream(name, matrixLayout(scalarType, rows, cols));
  }

  /**
   * Name the fields of a scalar stream, the elements of a vector stream or the rows of a matrix
   * stream.
   */
  async setLabels(streamId: number, labels: string[]): Promise<void> {
    const { layout } = this.#getStream(streamId);
    const expected = labelCount(layout);
    if (labels.length !== expected) {
      throw new Error(`Stream ${streamId} expects ${expected} labels, got ${labels.length}`);
    }
    if (layout.class === "scalar" && new Set(labels).size !== labels.length) {
      throw new Error(`Duplicate labels for stream ${streamId}: ${labels.join(", ")}`);
    }
    this.#recordBuilder.reset();
    this.#recordBuilder.writeLabels({ streamId, labels });
    await this.#flush();
  }

  async addScalarSample(
    streamId: number,
    timestamp: bigint,
    values: readonly ScalarValue[],
  ): Promise<void> {
    const { layout } = this.#getStream(streamId);
    if (layout.class !== "scalar") {
      throw new Error(`Stream ${streamId} is a ${layout.class} stream, not scalar`);
    }
    this.#payloadBuilder.reset();
    writeScalarSample(this.#payloadBuilder, layout, values);
    await this.#writeData(streamId, timestamp);
  }

  async addVectorSample(
    streamId: number,
    timestamp: bigint,
    values: ArrayLike<ScalarValue>,
  ): Promise<void> {
    const { layout } = this.#getStream(streamId);
    if (layout.class !== "vector") {
      throw new Error(`Stream ${streamId} is a ${layout.class} stream, not vector`);
    }
    this.#payloadBuilder.reset();
    writeVectorSample(this.#payloadBuilder, layout, values);
    await this.#writeData(streamId, timestamp);
  }

  /** `rows` holds the matrix in row-major order. */
  async addMatrixSample(
    streamId: number,
    timestamp: bigint,
    rows: ArrayLike<ArrayLike<ScalarValue>>,
  ): Promise<void> {
    const { layout } = this.#getStream(streamId);
    if (layout.class !== "matrix") {
      throw new Error(`Stream ${streamId} is a ${layout.class} stream, not matrix`);
    }
    this.#payloadBuilder.reset();
    writeMatrixSample(this.#payloadBuilder, layout, rows);
    await this.#writeData(streamId, timestamp);
  }

  async #addStream(name: string, layout: Layout): Promise<number> {
    const streamId = this.#nextStreamId;
    if (streamId > MAX_UINT32) {
      throw new RangeError("Stream ids exhausted");
    }
    this.#recordBuilder.reset();
    this.#recordBuilder.writeMetadata({ streamId, name, layout });
    await this.#flush();
    this.#streams.set(streamId, { name, layout });
    this.#nextStreamId++;
    return streamId;
  }

  #getStream(streamId: number): { name: string; layout: Layout } {
    const stream = this.#streams.get(streamId);
    if (!stream) {
      throw new Error(`Unknown stream id ${streamId}`);
    }
    return stream;
  }

  async #writeData(streamId: number, timestamp: bigint): Promise<void> {
    if (timestamp < 0n || timestamp > MAX_UINT64) {
      throw new RangeError(`Timestamp ${timestamp} is out of range for u64`);
    }
    this.#recordBuilder.reset();
    this.#recordBuilder.writeData({
      streamId,
      timestamp,
      payload: this.#payloadBuilder.bufferView(),
    });
    await this.#flush();
  }

  async #flush(): Promise<void> {
    await this.#writable.write(this.#recordBuilder.buffer);
    this.#recordBuilder.reset();
  }
}

function checkDimension(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_UINT32) {
    throw new RangeError(`Invalid ${name} ${value}`);
  }
}
