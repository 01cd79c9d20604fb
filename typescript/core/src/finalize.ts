import { TIMESTAMP_SIZE } from "./constants";
import { TruncatedInputError } from "./errors";
import { readElements, readScalar, scalarTypeSize } from "./scalarTypes";
import { DecodedStream, ElementArray, Layout, ScalarLayout, ScalarSample } from "./types";

/** Raw bytes accumulated for one stream while reading a log. */
export type AccumulatedStream = {
  id: number;
  name: string;
  layout: Layout;
  labels: string[] | undefined;
  timestampBytes: Uint8Array;
  sampleBytes: Uint8Array;
  /** Number of data records read; needed for layouts whose samples take no bytes */
  recordCount: number;
};

/**
 * Interpret the accumulated bytes of a stream as timestamps and typed samples. Matrix samples are
 * transposed from wire (column-major) to row-major order.
 */
export function finalizeStream(stream: AccumulatedStream): DecodedStream {
  const { id, name, layout, labels, timestampBytes, sampleBytes, recordCount } = stream;

  if (timestampBytes.byteLength !== recordCount * TIMESTAMP_SIZE) {
    throw new TruncatedInputError(
      `Stream ${id} (${name}) has ${timestampBytes.byteLength} timestamp bytes for ${recordCount} samples`,
    );
  }
  if (sampleBytes.byteLength !== recordCount * layout.byteSize) {
    throw new TruncatedInputError(
      `Stream ${id} (${name}) has ${sampleBytes.byteLength} sample bytes, expected ${recordCount} samples of ${layout.byteSize} bytes`,
    );
  }

  const timestampView = toDataView(timestampBytes);
  const timestamps = new BigUint64Array(recordCount);
  for (let i = 0; i < recordCount; i++) {
    timestamps[i] = timestampView.getBigUint64(i * TIMESTAMP_SIZE, true);
  }

  const view = toDataView(sampleBytes);
  const base = { id, name, labels, timestamps };
  switch (layout.class) {
    case "scalar":
      return {
        ...base,
        class: "scalar",
        layout,
        samples: readScalarSamples(view, layout, labels, recordCount),
      };
    case "vector": {
      const samples: ElementArray[] = [];
      for (let i = 0; i < recordCount; i++) {
        samples.push(readElements(view, i * layout.byteSize, layout.scalarType, layout.length));
      }
      return { ...base, class: "vector", layout, samples };
    }
    case "matrix": {
      const { scalarType, rows, cols, byteSize } = layout;
      const elementSize = scalarTypeSize(scalarType);
      const samples: ElementArray[][] = [];
      for (let i = 0; i < recordCount; i++) {
        const sample: ElementArray[] = [];
        for (let r = 0; r < rows; r++) {
          // row r of a column-major block starts at element r and steps over whole columns
          sample.push(
            readElements(view, i * byteSize + r * elementSize, scalarType, cols, rows * elementSize),
          );
        }
        samples.push(sample);
      }
      return { ...base, class: "matrix", layout, samples };
    }
  }
}

function readScalarSamples(
  view: DataView,
  layout: ScalarLayout,
  labels: readonly string[] | undefined,
  count: number,
): ScalarSample[] {
  let fieldOffset = 0;
  const fields = layout.fields.map((type, i) => {
    const field = { key: labels?.[i] ?? String(i), type, offset: fieldOffset };
    fieldOffset += scalarTypeSize(type);
    return field;
  });

  const samples: ScalarSample[] = [];
  for (let i = 0; i < count; i++) {
    const sampleOffset = i * layout.byteSize;
    samples.push(
      Object.fromEntries(
        fields.map(({ key, type, offset }) => [key, readScalar(view, sampleOffset + offset, type)]),
      ),
    );
  }
  return samples;
}

function toDataView(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
