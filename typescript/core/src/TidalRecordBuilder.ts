import { BufferBuilder } from "./BufferBuilder";
import { DataClass, Marker } from "./constants";
import { SCALAR_TYPES } from "./scalarTypes";
import type { Data, Labels, Metadata } from "./types";

/**
 * TidalRecordBuilder provides methods to serialize log records to a buffer in memory.
 *
 * It makes no effort to ensure the records are in a valid order (metadata before the labels and
 * data of a stream), and does not check that data payloads match the stream layout. This is the
 * responsibility of the caller; TidalWriter does both.
 */
export class TidalRecordBuilder {
  #bufferBuilder = new BufferBuilder();

  get length(): number {
    return this.#bufferBuilder.length;
  }

  get buffer(): Uint8Array {
    return this.#bufferBuilder.buffer;
  }

  reset(): void {
    this.#bufferBuilder.reset();
  }

  writeMetadata(metadata: Metadata): void {
    const { layout } = metadata;
    this.#bufferBuilder
      .uint8(Marker.METADATA)
      .uint32(metadata.streamId)
      .cstring(metadata.name);

    switch (layout.class) {
      case "scalar":
        this.#bufferBuilder.uint8(DataClass.SCALAR).uint32(layout.fields.length);
        for (const type of layout.fields) {
          this.#bufferBuilder.uint8(SCALAR_TYPES[type].code);
        }
        break;
      case "vector":
        this.#bufferBuilder
          .uint8(DataClass.VECTOR)
          .uint8(SCALAR_TYPES[layout.scalarType].code)
          .uint32(layout.length);
        break;
      case "matrix":
        this.#bufferBuilder
          .uint8(DataClass.MATRIX)
          .uint8(SCALAR_TYPES[layout.scalarType].code)
          .uint32(layout.rows)
          .uint32(layout.cols);
        break;
    }
  }

  writeLabels(labels: Labels): void {
    this.#bufferBuilder.uint8(Marker.LABELS).uint32(labels.streamId);
    for (const label of labels.labels) {
      this.#bufferBuilder.cstring(label);
    }
  }

  writeData(data: Data): void {
    this.#bufferBuilder
      .uint8(Marker.DATA)
      .uint32(data.streamId)
      .uint64(data.timestamp)
      .bytes(data.payload);
  }
}
