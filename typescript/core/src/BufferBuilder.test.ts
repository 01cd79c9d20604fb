import { BufferBuilder } from "./BufferBuilder";

describe("BufferBuilder", () => {
  it("grows past its initial capacity", () => {
    const builder = new BufferBuilder(1);
    builder.uint8(1).uint16(0x0302).uint32(0x07060504).int8(-1);
    expect(builder.buffer).toEqual(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 0xff]));
  });

  it("writes 64-bit values from numbers and bigints", () => {
    const builder = new BufferBuilder(0);
    builder.uint64(1).int64(-1n);
    expect(builder.buffer).toEqual(
      new Uint8Array([1, 0, 0, 0, 0, 0, 0, 0, 255, 255, 255, 255, 255, 255, 255, 255]),
    );
  });

  it("returns a view or a copy", () => {
    const builder = new BufferBuilder();
    builder.bytes(new Uint8Array([1, 2]));
    const copy = builder.buffer;
    const view = builder.bufferView();
    builder.reset().uint8(9);
    expect(copy).toEqual(new Uint8Array([1, 2]));
    expect(view).toEqual(new Uint8Array([9, 2]));
  });
});
