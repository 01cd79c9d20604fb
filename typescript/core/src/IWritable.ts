/**
 * Destination for serialized log records.
 */
export interface IWritable {
  // Append buffer to the output. Callers await each write before starting the next.
  write(buffer: Uint8Array): Promise<unknown>;
}
