import { BufferBuilder } from "./BufferBuilder";
import { TidalRecordBuilder } from "./TidalRecordBuilder";
import { matrixLayout, scalarLayout, vectorLayout } from "./layout";

describe("TidalRecordBuilder", () => {
  it("writes scalar metadata", () => {
    const writer = new TidalRecordBuilder();

    writer.writeMetadata({ streamId: 7, name: "imu", layout: scalarLayout(["i32", "f32"]) });

    const buffer = new BufferBuilder();
    buffer
      .uint8(0xa5) // marker
      .uint32(7) // stream id
      .cstring("imu")
      .uint8(0) // class
      .uint32(2) // field count
      .uint8(5) // i32
      .uint8(8); // f32

    expect(writer.buffer).toEqual(buffer.buffer);
    expect(writer.length).toEqual(buffer.length);
  });

  it("writes vector metadata", () => {
    const writer = new TidalRecordBuilder();

    writer.writeMetadata({ streamId: 1, name: "v", layout: vectorLayout("u16", 6) });

    const buffer = new BufferBuilder();
    buffer.uint8(0xa5).uint32(1).cstring("v").uint8(1).uint8(2).uint32(6);

    expect(writer.buffer).toEqual(buffer.buffer);
  });

  it("writes matrix metadata", () => {
    const writer = new TidalRecordBuilder();

    writer.writeMetadata({ streamId: 2, name: "m", layout: matrixLayout("f64", 3, 4) });

    const buffer = new BufferBuilder();
    buffer.uint8(0xa5).uint32(2).cstring("m").uint8(2).uint8(9).uint32(3).uint32(4);

    expect(writer.buffer).toEqual(buffer.buffer);
  });

  it("writes labels", () => {
    const writer = new TidalRecordBuilder();

    writer.writeLabels({ streamId: 3, labels: ["x", "yy"] });

    expect(writer.buffer).toEqual(
      new Uint8Array([0x66, 3, 0, 0, 0, 0x78, 0, 0x79, 0x79, 0]),
    );
  });

  it("writes data", () => {
    const writer = new TidalRecordBuilder();

    writer.writeData({ streamId: 4, timestamp: 0x0102n, payload: new Uint8Array([9, 8]) });

    expect(writer.buffer).toEqual(
      new Uint8Array([0xdb, 4, 0, 0, 0, 2, 1, 0, 0, 0, 0, 0, 0, 9, 8]),
    );
  });

  it("resets", () => {
    const writer = new TidalRecordBuilder();
    writer.writeLabels({ streamId: 0, labels: [] });
    writer.reset();
    expect(writer.length).toEqual(0);
  });

  it("rejects names containing NUL", () => {
    const writer = new TidalRecordBuilder();
    expect(() => {
      writer.writeMetadata({ streamId: 0, name: "a\0b", layout: vectorLayout("u8", 1) });
    }).toThrow('String "a\\u0000b" contains a NUL character');
  });
});
