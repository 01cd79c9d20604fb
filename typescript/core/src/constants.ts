export enum Marker {
  METADATA = 0xa5,
  LABELS = 0x66,
  DATA = 0xdb,
}

export enum DataClass {
  SCALAR = 0,
  VECTOR = 1,
  MATRIX = 2,
}

/** Wire codes of the primitive element types. */
export enum ScalarTypeCode {
  U8 = 0,
  I8 = 1,
  U16 = 2,
  I16 = 3,
  U32 = 4,
  I32 = 5,
  U64 = 6,
  I64 = 7,
  F32 = 8,
  F64 = 9,
  BOOL = 10,
}

export const STREAM_ID_SIZE = 4;
export const TIMESTAMP_SIZE = 8;
export const NUL = 0x00;

export function isKnownMarker(marker: number): marker is Marker {
  return marker === Marker.METADATA || marker === Marker.LABELS || marker === Marker.DATA;
}

export function isKnownScalarTypeCode(code: number): code is ScalarTypeCode {
  return Number.isInteger(code) && code >= ScalarTypeCode.U8 && code <= ScalarTypeCode.BOOL;
}
