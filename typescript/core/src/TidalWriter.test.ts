import { TempBuffer } from "./TempBuffer";
import { decodeTidal } from "./TidalDecoder";
import { TidalWriter } from "./TidalWriter";
import { ScalarTypeCode } from "./constants";
import { ALL_SCALAR_TYPES } from "./scalarTypes";
import { concat, data, labels, matrixMetadata, scalarMetadata } from "./testUtils";
import { ScalarType, ScalarValue } from "./types";

// two distinct values per type, including the extremes of each integer range
const VALUES: Record<ScalarType, [ScalarValue, ScalarValue]> = {
  u8: [0, 255],
  i8: [-128, 127],
  u16: [0, 65535],
  i16: [-32768, 32767],
  u32: [0, 4294967295],
  i32: [-2147483648, 2147483647],
  u64: [0n, 18446744073709551615n],
  i64: [-9223372036854775808n, 9223372036854775807n],
  f32: [1.5, -0.25],
  f64: [Math.PI, -1e300],
  bool: [true, false],
};

function valuesOf(type: ScalarType): [ScalarValue, ScalarValue] {
  return VALUES[type];
}

describe("TidalWriter", () => {
  it("writes the wire format", async () => {
    const tempBuffer = new TempBuffer();
    const writer = new TidalWriter({ writable: tempBuffer, startStreamId: 3 });

    const scalarId = await writer.addScalarStream("s", ["u8", "u8"]);
    await writer.setLabels(scalarId, ["a", "b"]);
    const matrixId = await writer.addMatrixStream("m", "u8", 2, 3);
    await writer.addMatrixSample(matrixId, 9n, [
      [0, 1, 2],
      [3, 4, 5],
    ]);
    await writer.addScalarSample(scalarId, 10n, [1, 2]);

    expect([scalarId, matrixId]).toEqual([3, 4]);
    expect(tempBuffer.get()).toEqual(
      concat(
        scalarMetadata(3, "s", [ScalarTypeCode.U8, ScalarTypeCode.U8]),
        labels(3, ["a", "b"]),
        matrixMetadata(4, "m", ScalarTypeCode.U8, 2, 3),
        data(4, 9n, [0, 3, 1, 4, 2, 5]),
        data(3, 10n, [1, 2]),
      ),
    );
  });

  it("round trips a scalar stream of every type", async () => {
    const tempBuffer = new TempBuffer();
    const writer = new TidalWriter({ writable: tempBuffer });
    const fields = [...ALL_SCALAR_TYPES];
    const id = await writer.addScalarStream("all", fields);
    await writer.addScalarSample(id, 1n, fields.map((type) => valuesOf(type)[0]));
    await writer.addScalarSample(id, 2n, fields.map((type) => valuesOf(type)[1]));

    const stream = decodeTidal(tempBuffer.get()).get("all");
    expect(stream?.class).toBe("scalar");
    expect(Array.from(stream?.timestamps ?? [])).toEqual([1n, 2n]);
    expect(stream?.samples).toEqual([
      Object.fromEntries(fields.map((type, i) => [String(i), valuesOf(type)[0]])),
      Object.fromEntries(fields.map((type, i) => [String(i), valuesOf(type)[1]])),
    ]);
  });

  it.each(ALL_SCALAR_TYPES)("round trips vector and matrix streams of %s", async (type) => {
    const [a, b] = valuesOf(type);
    const tempBuffer = new TempBuffer();
    const writer = new TidalWriter({ writable: tempBuffer });
    const vectorId = await writer.addVectorStream("vector", type, 3);
    const matrixId = await writer.addMatrixStream("matrix", type, 2, 3);
    await writer.addVectorSample(vectorId, 100n, [a, b, a]);
    await writer.addMatrixSample(matrixId, 200n, [
      [a, a, b],
      [b, a, b],
    ]);
    await writer.addVectorSample(vectorId, 300n, [b, b, a]);

    const log = decodeTidal(tempBuffer.get());
    const vector = log.get("vector");
    const matrix = log.get("matrix");
    if (vector?.class !== "vector" || matrix?.class !== "matrix") {
      throw new Error("unexpected stream classes");
    }
    expect(Array.from(vector.timestamps)).toEqual([100n, 300n]);
    expect(vector.samples.map((sample) => Array.from<ScalarValue>(sample))).toEqual([
      [a, b, a],
      [b, b, a],
    ]);
    expect(Array.from(matrix.timestamps)).toEqual([200n]);
    expect(matrix.samples.map((sample) => sample.map((row) => Array.from<ScalarValue>(row)))).toEqual([
      [
        [a, a, b],
        [b, a, b],
      ],
    ]);
  });

  it("labels vector elements and matrix rows", async () => {
    const tempBuffer = new TempBuffer();
    const writer = new TidalWriter({ writable: tempBuffer });
    const vectorId = await writer.addVectorStream("position", "f64", 3);
    const matrixId = await writer.addMatrixStream("covariance", "f32", 2, 2);
    await writer.setLabels(vectorId, ["x", "y", "z"]);
    await writer.setLabels(matrixId, ["r0", "r1"]);

    const log = decodeTidal(tempBuffer.get());
    expect(log.get("position")?.labels).toEqual(["x", "y", "z"]);
    expect(log.get("covariance")?.labels).toEqual(["r0", "r1"]);
  });

  it("rejects values that do not fit the field type", async () => {
    const writer = new TidalWriter({ writable: new TempBuffer() });
    const id = await writer.addScalarStream("s", ["u8", "f32", "bool"]);
    await expect(writer.addScalarSample(id, 0n, [256, 1, true])).rejects.toThrow(RangeError);
    await expect(writer.addScalarSample(id, 0n, [1.5, 1, true])).rejects.toThrow(RangeError);
    await expect(writer.addScalarSample(id, 0n, [1, 1n, true])).rejects.toThrow(TypeError);
    await expect(writer.addScalarSample(id, 0n, [1, 1, 1])).rejects.toThrow(TypeError);
    await expect(writer.addScalarSample(id, 0n, [1, 1])).rejects.toThrow(
      "Expected 3 values, got 2",
    );
    await expect(writer.addScalarSample(id, -1n, [1, 1, true])).rejects.toThrow(RangeError);
  });

  it("rejects samples with missing elements", async () => {
    const writer = new TidalWriter({ writable: new TempBuffer() });
    const vectorId = await writer.addVectorStream("v", "bool", 3);
    const matrixId = await writer.addMatrixStream("m", "u8", 1, 2);
    const sparse = new Array<ScalarValue>(3);
    sparse[0] = true;
    sparse[2] = false;
    await expect(writer.addVectorSample(vectorId, 0n, sparse)).rejects.toThrow(
      "Missing value at index 1",
    );
    const sparseRow = new Array<ScalarValue>(2);
    sparseRow[1] = 4;
    await expect(writer.addMatrixSample(matrixId, 0n, [sparseRow])).rejects.toThrow(
      "Missing value at index 0",
    );
  });

  it("does not write a rejected sample", async () => {
    const tempBuffer = new TempBuffer();
    const writer = new TidalWriter({ writable: tempBuffer });
    const id = await writer.addVectorStream("v", "i8", 2);
    await expect(writer.addVectorSample(id, 1n, [1, 200])).rejects.toThrow(RangeError);
    await writer.addVectorSample(id, 2n, [1, 2]);

    const stream = decodeTidal(tempBuffer.get()).get("v");
    expect(Array.from(stream?.timestamps ?? [])).toEqual([2n]);
  });

  it("rejects misuse of streams", async () => {
    const writer = new TidalWriter({ writable: new TempBuffer() });
    const id = await writer.addMatrixStream("m", "u16", 2, 2);
    await expect(writer.addVectorSample(id, 0n, [1, 2])).rejects.toThrow(
      "Stream 0 is a matrix stream, not vector",
    );
    await expect(writer.addMatrixSample(id, 0n, [[1, 2], [3]])).rejects.toThrow(
      "Expected 2 columns in row 1, got 1",
    );
    await expect(writer.setLabels(id, ["a", "b", "c", "d"])).rejects.toThrow(
      "Stream 0 expects 2 labels, got 4",
    );
    await expect(writer.addScalarSample(5, 0n, [])).rejects.toThrow("Unknown stream id 5");
    await expect(writer.addVectorStream("bad", "u8", -1)).rejects.toThrow(RangeError);
  });

  it("rejects duplicate scalar labels", async () => {
    const writer = new TidalWriter({ writable: new TempBuffer() });
    const id = await writer.addScalarStream("s", ["u8", "u8"]);
    await expect(writer.setLabels(id, ["a", "a"])).rejects.toThrow("Duplicate labels");
  });
});
