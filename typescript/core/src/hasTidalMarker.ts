import { Marker } from "./constants";

/**
 * Check if the given buffer looks like the start of a TiDaL log. Every non-empty log starts with
 * a metadata record, since label and data records refer to a declared stream.
 */
export function hasTidalMarker(prefix: DataView): boolean {
  return prefix.byteLength > 0 && prefix.getUint8(0) === Marker.METADATA;
}
