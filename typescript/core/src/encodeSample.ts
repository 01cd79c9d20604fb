import { BufferBuilder } from "./BufferBuilder";
import { MatrixLayout, ScalarLayout, ScalarType, ScalarValue, VectorLayout } from "./types";

type IntegerType = Exclude<ScalarType, "f32" | "f64" | "bool">;

const INTEGER_RANGES: Readonly<Record<IntegerType, readonly [min: bigint, max: bigint]>> = {
  u8: [0n, 0xffn],
  i8: [-0x80n, 0x7fn],
  u16: [0n, 0xffffn],
  i16: [-0x8000n, 0x7fffn],
  u32: [0n, 0xffffffffn],
  i32: [-0x80000000n, 0x7fffffffn],
  u64: [0n, 0xffffffffffffffffn],
  i64: [-0x8000000000000000n, 0x7fffffffffffffffn],
};

function toInteger(value: ScalarValue, type: IntegerType): bigint {
  if (typeof value === "boolean") {
    throw new TypeError(`Expected an integer for ${type}, got ${value}`);
  }
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new RangeError(`${value} is not an integer (${type})`);
  }
  const integer = BigInt(value);
  const [min, max] = INTEGER_RANGES[type];
  if (integer < min || integer > max) {
    throw new RangeError(`${value} is out of range for ${type} [${min}, ${max}]`);
  }
  return integer;
}

function toFloat(value: ScalarValue, type: "f32" | "f64"): number {
  if (typeof value !== "number") {
    throw new TypeError(`Expected a number for ${type}, got ${typeof value}`);
  }
  return value;
}

/** Append one element in its little-endian wire form. */
export function writeScalarValue(builder: BufferBuilder, type: ScalarType, value: ScalarValue): void {
  switch (type) {
    case "u8":
      builder.uint8(Number(toInteger(value, type)));
      break;
    case "i8":
      builder.int8(Number(toInteger(value, type)));
      break;
    case "u16":
      builder.uint16(Number(toInteger(value, type)));
      break;
    case "i16":
      builder.int16(Number(toInteger(value, type)));
      break;
    case "u32":
      builder.uint32(Number(toInteger(value, type)));
      break;
    case "i32":
      builder.int32(Number(toInteger(value, type)));
      break;
    case "u64":
      builder.uint64(toInteger(value, type));
      break;
    case "i64":
      builder.int64(toInteger(value, type));
      break;
    case "f32":
      builder.float32(toFloat(value, type));
      break;
    case "f64":
      builder.float64(toFloat(value, type));
      break;
    case "bool":
      if (typeof value !== "boolean") {
        throw new TypeError(`Expected a boolean for bool, got ${typeof value}`);
      }
      builder.uint8(value ? 1 : 0);
      break;
  }
}

function elementAt(values: ArrayLike<ScalarValue>, index: number): ScalarValue {
  const value = values[index];
  if (value == undefined) {
    throw new TypeError(`Missing value at index ${index}`);
  }
  return value;
}

export function writeScalarSample(
  builder: BufferBuilder,
  layout: ScalarLayout,
  values: readonly ScalarValue[],
): void {
  if (values.length !== layout.fields.length) {
    throw new Error(`Expected ${layout.fields.length} values, got ${values.length}`);
  }
  layout.fields.forEach((type, i) => {
    writeScalarValue(builder, type, elementAt(values, i));
  });
}

export function writeVectorSample(
  builder: BufferBuilder,
  layout: VectorLayout,
  values: ArrayLike<ScalarValue>,
): void {
  if (values.length !== layout.length) {
    throw new Error(`Expected ${layout.length} elements, got ${values.length}`);
  }
  for (let i = 0; i < values.length; i++) {
    writeScalarValue(builder, layout.scalarType, elementAt(values, i));
  }
}

/** `rows` holds the matrix in row-major order; it is written column-major. */
export function writeMatrixSample(
  builder: BufferBuilder,
  layout: MatrixLayout,
  rows: ArrayLike<ArrayLike<ScalarValue>>,
): void {
  if (rows.length !== layout.rows) {
    throw new Error(`Expected ${layout.rows} rows, got ${rows.length}`);
  }
  const rowArrays = Array.from(rows, (row, r) => {
    if (row.length !== layout.cols) {
      throw new Error(`Expected ${layout.cols} columns in row ${r}, got ${row.length}`);
    }
    return row;
  });
  for (let c = 0; c < layout.cols; c++) {
    for (const row of rowArrays) {
      writeScalarValue(builder, layout.scalarType, elementAt(row, c));
    }
  }
}
