export { FileHandleReadable } from "./FileHandleReadable";
export { FileHandleWritable } from "./FileHandleWritable";
export { decodeTidalFile } from "./decodeTidalFile";
export type { DecodeFileOptions } from "./decodeTidalFile";
