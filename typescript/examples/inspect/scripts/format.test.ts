import { TempBuffer, TidalTypes, TidalWriter, decodeTidal } from "@tidal/core";

import { streamToCsv, summarizeLog } from "./format";

async function sampleLog(): Promise<TidalTypes.DecodedLog> {
  const tempBuffer = new TempBuffer();
  const writer = new TidalWriter({ writable: tempBuffer });
  const imu = await writer.addScalarStream("imu", ["i32", "f32"]);
  const pos = await writer.addVectorStream("pos", "u8", 2);
  const flags = await writer.addMatrixStream("m", "bool", 2, 1);
  await writer.setLabels(imu, ["count", "ratio"]);
  await writer.setLabels(flags, ["top", "b,c"]);
  await writer.addScalarSample(imu, 10n, [1, 0.5]);
  await writer.addVectorSample(pos, 15n, [3, 4]);
  await writer.addScalarSample(imu, 20n, [2, 1.5]);
  await writer.addMatrixSample(flags, 30n, [[true], [false]]);
  return decodeTidal(tempBuffer.get());
}

function getStream(log: TidalTypes.DecodedLog, name: string): TidalTypes.DecodedStream {
  const stream = log.get(name);
  if (!stream) {
    throw new Error(`missing stream ${name}`);
  }
  return stream;
}

describe("summarizeLog", () => {
  it("lists one line per stream", async () => {
    expect(summarizeLog(await sampleLog())).toEqual([
      "imu  id=0  scalar(i32, f32)  samples=2  time=10..20",
      "pos  id=1  vector<u8>[2]  samples=1  time=15..15",
      "m    id=2  matrix<bool>[2x1]  samples=1  time=30..30",
    ]);
  });

  it("lists fields and labels", async () => {
    expect(summarizeLog(await sampleLog(), { fields: true })).toEqual([
      "imu  id=0  scalar(i32, f32)  samples=2  time=10..20",
      "    count  i32",
      "    ratio  f32",
      "pos  id=1  vector<u8>[2]  samples=1  time=15..15",
      "    [0]  u8",
      "    [1]  u8",
      "m    id=2  matrix<bool>[2x1]  samples=1  time=30..30",
      "    top  bool[1]",
      "    b,c  bool[1]",
    ]);
  });

  it("marks streams without samples", async () => {
    const tempBuffer = new TempBuffer();
    const writer = new TidalWriter({ writable: tempBuffer });
    await writer.addVectorStream("idle", "u64", 1);
    expect(summarizeLog(decodeTidal(tempBuffer.get()))).toEqual([
      "idle  id=0  vector<u64>[1]  samples=0  time=-",
    ]);
  });
});

describe("streamToCsv", () => {
  it("writes scalar samples under their labels", async () => {
    const log = await sampleLog();
    expect(streamToCsv(getStream(log, "imu"))).toBe("timestamp,count,ratio\n10,1,0.5\n20,2,1.5\n");
  });

  it("names unlabeled vector elements by position", async () => {
    const log = await sampleLog();
    expect(streamToCsv(getStream(log, "pos"))).toBe("timestamp,[0],[1]\n15,3,4\n");
  });

  it("flattens matrix rows and quotes labels", async () => {
    const log = await sampleLog();
    expect(streamToCsv(getStream(log, "m"))).toBe('timestamp,top[0],"b,c[0]"\n30,1,0\n');
  });
});
