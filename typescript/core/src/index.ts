export { default as TidalStreamReader } from "./TidalStreamReader";
export type { TidalReaderOptions } from "./TidalStreamReader";
export { TidalDecoder, decodeTidal } from "./TidalDecoder";
export { default as Reader } from "./Reader";
export { decodeReadable } from "./decodeReadable";
export type { DecodeReadableOptions } from "./decodeReadable";
export { TidalWriter } from "./TidalWriter";
export type { TidalWriterOptions } from "./TidalWriter";
export { TidalRecordBuilder } from "./TidalRecordBuilder";
export * as TidalTypes from "./types";
export * as TidalConstants from "./constants";
export type { IWritable } from "./IWritable";

export * from "./errors";
export * from "./hasTidalMarker";
export * from "./layout";
export * from "./parse";
export * from "./TempBuffer";
export { ALL_SCALAR_TYPES, SCALAR_TYPES, scalarTypeSize } from "./scalarTypes";
export type {
  DecodedLog,
  DecodedStream,
  ElementArray,
  Layout,
  ScalarSample,
  ScalarType,
  ScalarValue,
} from "./types";
