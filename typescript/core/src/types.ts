export type ScalarType =
  | "u8"
  | "i8"
  | "u16"
  | "i16"
  | "u32"
  | "i32"
  | "u64"
  | "i64"
  | "f32"
  | "f64"
  | "bool";

export type ScalarLayout = {
  class: "scalar";
  fields: ScalarType[];
  /** Size in bytes of one sample */
  byteSize: number;
};
export type VectorLayout = {
  class: "vector";
  scalarType: ScalarType;
  length: number;
  byteSize: number;
};
/** Samples of a matrix layout are stored column-major on the wire. */
export type MatrixLayout = {
  class: "matrix";
  scalarType: ScalarType;
  rows: number;
  cols: number;
  byteSize: number;
};
export type Layout = ScalarLayout | VectorLayout | MatrixLayout;
export type StreamClass = Layout["class"];

export type Metadata = {
  streamId: number;
  name: string;
  layout: Layout;
};
export type Labels = {
  streamId: number;
  labels: string[];
};
export type Data = {
  streamId: number;
  timestamp: bigint;
  payload: Uint8Array;
};

export type TidalRecords = {
  Metadata: Metadata;
  Labels: Labels;
  Data: Data;
};

export type TypedTidalRecords = {
  [R in keyof TidalRecords]: TidalRecords[R] & { type: R };
};

type Values<T> = T[keyof T];
export type TypedTidalRecord = Values<TypedTidalRecords>;
export type TidalRecord = Values<TidalRecords>;

/** u64 and i64 elements decode to bigint, bool to boolean, everything else to number. */
export type ScalarValue = number | bigint | boolean;

export type ElementArray =
  | Uint8Array
  | Int8Array
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | BigUint64Array
  | BigInt64Array
  | Float32Array
  | Float64Array
  | boolean[];

/**
 * One sample of a scalar stream. Fields are keyed by label, or by position ("0", "1", ...) when
 * the stream has no labels.
 */
export type ScalarSample = Record<string, ScalarValue>;

type DecodedStreamBase = {
  id: number;
  name: string;
  labels: string[] | undefined;
  timestamps: BigUint64Array;
};

export type DecodedScalarStream = DecodedStreamBase & {
  class: "scalar";
  layout: ScalarLayout;
  samples: ScalarSample[];
};
export type DecodedVectorStream = DecodedStreamBase & {
  class: "vector";
  layout: VectorLayout;
  samples: ElementArray[];
};
/** Each sample is an array of `rows` row arrays holding `cols` elements. */
export type DecodedMatrixStream = DecodedStreamBase & {
  class: "matrix";
  layout: MatrixLayout;
  samples: ElementArray[][];
};
export type DecodedStream = DecodedScalarStream | DecodedVectorStream | DecodedMatrixStream;

/** Decoded streams keyed by stream name, in declaration order. */
export type DecodedLog = Map<string, DecodedStream>;

/**
 * IReadable describes a random-access reader interface.
 */
export interface IReadable {
  size(): Promise<number>;
  read(offset: number, size: number): Promise<Uint8Array>;
}
