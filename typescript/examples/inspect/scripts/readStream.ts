import { TidalDecoder, TidalStreamReader, TidalTypes } from "@tidal/core";
import { createReadStream } from "fs";

/**
 * Decode a log while reading it through a Node.js read stream. A file that ends inside a record
 * fails with a TruncatedInputError.
 */
export async function readStream(filePath: string): Promise<TidalTypes.DecodedLog> {
  const reader = new TidalStreamReader();
  const decoder = new TidalDecoder();
  const drain = () => {
    for (let record; (record = reader.nextRecord()); ) {
      decoder.handleRecord(record);
    }
  };

  await new Promise<void>((resolve, reject) => {
    let failed = false;
    const fail = (error: unknown) => {
      failed = true;
      reject(error);
    };
    const stream = createReadStream(filePath);
    stream.on("data", (data) => {
      try {
        if (typeof data === "string") {
          throw new Error("expected buffer");
        }
        reader.append(data);
        drain();
      } catch (error) {
        fail(error);
        stream.close();
      }
    });
    stream.on("error", fail);
    stream.on("close", () => {
      if (failed) {
        return;
      }
      try {
        reader.end();
        drain();
        resolve();
      } catch (error) {
        reject(error);
      }
    });
  });

  return decoder.finish();
}
