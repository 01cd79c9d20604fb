import { DataClass, Marker, ScalarTypeCode } from "./constants";

export function uint16LE(n: number): Uint8Array {
  const result = new Uint8Array(2);
  new DataView(result.buffer).setUint16(0, n, true);
  return result;
}

export function uint32LE(n: number): Uint8Array {
  const result = new Uint8Array(4);
  new DataView(result.buffer).setUint32(0, n, true);
  return result;
}

export function uint64LE(n: bigint): Uint8Array {
  const result = new Uint8Array(8);
  new DataView(result.buffer).setBigUint64(0, n, true);
  return result;
}

export function float64LE(n: number): Uint8Array {
  const result = new Uint8Array(8);
  new DataView(result.buffer).setFloat64(0, n, true);
  return result;
}

export function cstring(str: string): Uint8Array {
  return new Uint8Array([...new TextEncoder().encode(str), 0]);
}

export function record(marker: Marker, data: ArrayLike<number>[]): Uint8Array {
  const parts = data.flatMap((part) => Array.from(part));
  return new Uint8Array([marker, ...parts]);
}

export function scalarMetadata(
  streamId: number,
  name: string,
  fields: ScalarTypeCode[],
): Uint8Array {
  return record(Marker.METADATA, [
    uint32LE(streamId),
    cstring(name),
    [DataClass.SCALAR],
    uint32LE(fields.length),
    fields,
  ]);
}

export function vectorMetadata(
  streamId: number,
  name: string,
  type: ScalarTypeCode,
  length: number,
): Uint8Array {
  return record(Marker.METADATA, [
    uint32LE(streamId),
    cstring(name),
    [DataClass.VECTOR, type],
    uint32LE(length),
  ]);
}

export function matrixMetadata(
  streamId: number,
  name: string,
  type: ScalarTypeCode,
  rows: number,
  cols: number,
): Uint8Array {
  return record(Marker.METADATA, [
    uint32LE(streamId),
    cstring(name),
    [DataClass.MATRIX, type],
    uint32LE(rows),
    uint32LE(cols),
  ]);
}

export function labels(streamId: number, names: string[]): Uint8Array {
  return record(Marker.LABELS, [uint32LE(streamId), ...names.map(cstring)]);
}

export function data(streamId: number, timestamp: bigint, payload: ArrayLike<number>): Uint8Array {
  return record(Marker.DATA, [uint32LE(streamId), uint64LE(timestamp), payload]);
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const result = new Uint8Array(parts.reduce((total, part) => total + part.byteLength, 0));
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.byteLength;
  }
  return result;
}
