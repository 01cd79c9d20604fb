import { ScalarTypeCode } from "./constants";
import { ElementArray, ScalarType, ScalarValue } from "./types";

const LITTLE_ENDIAN = true;

export const SCALAR_TYPES: Readonly<Record<ScalarType, { code: ScalarTypeCode; size: number }>> =
  Object.freeze({
    u8: { code: ScalarTypeCode.U8, size: 1 },
    i8: { code: ScalarTypeCode.I8, size: 1 },
    u16: { code: ScalarTypeCode.U16, size: 2 },
    i16: { code: ScalarTypeCode.I16, size: 2 },
    u32: { code: ScalarTypeCode.U32, size: 4 },
    i32: { code: ScalarTypeCode.I32, size: 4 },
    u64: { code: ScalarTypeCode.U64, size: 8 },
    i64: { code: ScalarTypeCode.I64, size: 8 },
    f32: { code: ScalarTypeCode.F32, size: 4 },
    f64: { code: ScalarTypeCode.F64, size: 8 },
    bool: { code: ScalarTypeCode.BOOL, size: 1 },
  });

export const ALL_SCALAR_TYPES: readonly ScalarType[] = [
  "u8",
  "i8",
  "u16",
  "i16",
  "u32",
  "i32",
  "u64",
  "i64",
  "f32",
  "f64",
  "bool",
];

export function scalarTypeFromCode(code: ScalarTypeCode): ScalarType {
  switch (code) {
    case ScalarTypeCode.U8:
      return "u8";
    case ScalarTypeCode.I8:
      return "i8";
    case ScalarTypeCode.U16:
      return "u16";
    case ScalarTypeCode.I16:
      return "i16";
    case ScalarTypeCode.U32:
      return "u32";
    case ScalarTypeCode.I32:
      return "i32";
    case ScalarTypeCode.U64:
      return "u64";
    case ScalarTypeCode.I64:
      return "i64";
    case ScalarTypeCode.F32:
      return "f32";
    case ScalarTypeCode.F64:
      return "f64";
    case ScalarTypeCode.BOOL:
      return "bool";
  }
}

export function scalarTypeSize(type: ScalarType): number {
  return SCALAR_TYPES[type].size;
}

/** Read a single little-endian element of `type` at `offset`. */
export function readScalar(view: DataView, offset: number, type: ScalarType): ScalarValue {
  switch (type) {
    case "u8":
      return view.getUint8(offset);
    case "i8":
      return view.getInt8(offset);
    case "u16":
      return view.getUint16(offset, LITTLE_ENDIAN);
    case "i16":
      return view.getInt16(offset, LITTLE_ENDIAN);
    case "u32":
      return view.getUint32(offset, LITTLE_ENDIAN);
    case "i32":
      return view.getInt32(offset, LITTLE_ENDIAN);
    case "u64":
      return view.getBigUint64(offset, LITTLE_ENDIAN);
    case "i64":
      return view.getBigInt64(offset, LITTLE_ENDIAN);
    case "f32":
      return view.getFloat32(offset, LITTLE_ENDIAN);
    case "f64":
      return view.getFloat64(offset, LITTLE_ENDIAN);
    case "bool":
      return view.getUint8(offset) !== 0;
  }
}

function fill<A extends { [index: number]: V }, V>(
  out: A,
  count: number,
  offset: number,
  stride: number,
  read: (offset: number) => V,
): A {
  for (let i = 0; i < count; i++) {
    out[i] = read(offset + i * stride);
  }
  return out;
}

/**
 * Read `count` elements of `type` into a new array. Element `i` is read at `offset + i * stride`,
 * so a stride larger than the element size walks across a column-major block.
 */
export function readElements(
  view: DataView,
  offset: number,
  type: ScalarType,
  count: number,
  stride = scalarTypeSize(type),
): ElementArray {
  switch (type) {
    case "u8":
      return fill(new Uint8Array(count), count, offset, stride, (o) => view.getUint8(o));
    case "i8":
      return fill(new Int8Array(count), count, offset, stride, (o) => view.getInt8(o));
    case "u16":
      return fill(new Uint16Array(count), count, offset, stride, (o) =>
        view.getUint16(o, LITTLE_ENDIAN),
      );
    case "i16":
      return fill(new Int16Array(count), count, offset, stride, (o) =>
        view.getInt16(o, LITTLE_ENDIAN),
      );
    case "u32":
      return fill(new Uint32Array(count), count, offset, stride, (o) =>
        view.getUint32(o, LITTLE_ENDIAN),
      );
    case "i32":
      return fill(new Int32Array(count), count, offset, stride, (o) =>
        view.getInt32(o, LITTLE_ENDIAN),
      );
    case "u64":
      return fill(new BigUint64Array(count), count, offset, stride, (o) =>
        view.getBigUint64(o, LITTLE_ENDIAN),
      );
    case "i64":
      return fill(new BigInt64Array(count), count, offset, stride, (o) =>
        view.getBigInt64(o, LITTLE_ENDIAN),
      );
    case "f32":
      return fill(new Float32Array(count), count, offset, stride, (o) =>
        view.getFloat32(o, LITTLE_ENDIAN),
      );
    case "f64":
      return fill(new Float64Array(count), count, offset, stride, (o) =>
        view.getFloat64(o, LITTLE_ENDIAN),
      );
    case "bool":
      return fill(new Array<boolean>(count), count, offset, stride, (o) => view.getUint8(o) !== 0);
  }
}
