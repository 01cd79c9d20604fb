import Reader from "./Reader";
import { DataClass, Marker, isKnownMarker, isKnownScalarTypeCode } from "./constants";
import { InvalidFormatError, StreamNotFoundError } from "./errors";
import { labelCount, matrixLayout, scalarLayout, vectorLayout } from "./layout";
import { scalarTypeFromCode } from "./scalarTypes";
import { Layout, ScalarType, TypedTidalRecord } from "./types";

/** Resolves the current layout of a previously declared stream. */
export type LayoutLookup = (streamId: number) => Layout | undefined;

/**
 * Parse the record at the reader's offset. Returns undefined when no bytes remain, which is the
 * only place the input may end. Label and data records are sized by the layout of their stream,
 * so `getLayout` must know every stream declared so far.
 *
 * Throws TruncatedInputError if the input ends inside the record.
 */
export function parseRecord(reader: Reader, getLayout: LayoutLookup): TypedTidalRecord | undefined {
  if (reader.bytesRemaining() === 0) {
    return undefined;
  }
  const start = reader.position;
  const marker = reader.uint8();
  if (!isKnownMarker(marker)) {
    throw new InvalidFormatError(
      `Unrecognized record marker 0x${marker.toString(16).padStart(2, "0")}`,
      start,
    );
  }

  switch (marker) {
    case Marker.METADATA:
      return parseMetadata(reader, start);
    case Marker.LABELS:
      return parseLabels(reader, getLayout, start);
    case Marker.DATA:
      return parseData(reader, getLayout, start);
  }
}

function parseMetadata(reader: Reader, start: number): TypedTidalRecord {
  const streamId = reader.uint32();
  const name = reader.string();
  const dataClass = reader.uint8();

  let layout: Layout;
  switch (dataClass) {
    case DataClass.SCALAR: {
      const fieldCount = reader.uint32();
      const fields: ScalarType[] = [];
      for (let i = 0; i < fieldCount; i++) {
        fields.push(parseScalarType(reader, streamId, start));
      }
      layout = scalarLayout(fields);
      break;
    }
    case DataClass.VECTOR: {
      const scalarType = parseScalarType(reader, streamId, start);
      const length = reader.uint32();
      layout = vectorLayout(scalarType, length);
      break;
    }
    case DataClass.MATRIX: {
      const scalarType = parseScalarType(reader, streamId, start);
      const rows = reader.uint32();
      const cols = reader.uint32();
      layout = matrixLayout(scalarType, rows, cols);
      break;
    }
    default:
      throw new InvalidFormatError(
        `Unrecognized data class ${dataClass} for stream ${streamId} (${name})`,
        start,
      );
  }

  return { type: "Metadata", streamId, name, layout };
}

function parseScalarType(reader: Reader, streamId: number, start: number): ScalarType {
  const code = reader.uint8();
  if (!isKnownScalarTypeCode(code)) {
    throw new InvalidFormatError(
      `Unrecognized scalar type code ${code} for stream ${streamId}`,
      start,
    );
  }
  return scalarTypeFromCode(code);
}

function parseLabels(reader: Reader, getLayout: LayoutLookup, start: number): TypedTidalRecord {
  const streamId = reader.uint32();
  const layout = getLayout(streamId);
  if (!layout) {
    throw new StreamNotFoundError(streamId, "Labels", start);
  }
  const labels: string[] = [];
  for (let i = 0, count = labelCount(layout); i < count; i++) {
    labels.push(reader.string());
  }
  if (layout.class === "scalar" && new Set(labels).size !== labels.length) {
    throw new InvalidFormatError(
      `Duplicate labels for stream ${streamId}: ${labels.join(", ")}`,
      start,
    );
  }
  return { type: "Labels", streamId, labels };
}

function parseData(reader: Reader, getLayout: LayoutLookup, start: number): TypedTidalRecord {
  const streamId = reader.uint32();
  const layout = getLayout(streamId);
  if (!layout) {
    throw new StreamNotFoundError(streamId, "Data", start);
  }
  const timestamp = reader.uint64();
  const payload = reader.u8ArrayCopy(layout.byteSize);
  return { type: "Data", streamId, timestamp, payload };
}
