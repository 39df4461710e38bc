import { describe, expect, it } from "vitest";

import { readUIntLE, writeUIntLE } from "../read_uint_le.ts";

describe("readUIntLE", () => {
  it("reads little endian integers within bounds", () => {
    const bytes = new Uint8Array([0x34, 0x12, 0x56, 0x78]);
    expect(readUIntLE(bytes, 0, 4)).toBe(0x78561234);
  });

  it("returns an unsigned value when the top bit is set", () => {
    const bytes = new Uint8Array([0xff, 0xff, 0xff, 0xff]);
    expect(readUIntLE(bytes, 0, 4)).toBe(0xffffffff);
  });

  it("places the second byte in the high position", () => {
    const bytes = new Uint8Array([0x34, 0x12]);
    expect(readUIntLE(bytes, 0, 2)).toBe(0x1234);
  });

  it("stops reading when exceeding the array length", () => {
    const bytes = new Uint8Array([0xff, 0x00]);
    expect(readUIntLE(bytes, 1, 4)).toBe(0);
  });
});

describe("writeUIntLE", () => {
  it("emits the least significant byte first", () => {
    expect(Array.from(writeUIntLE(0x78561234, 4))).toEqual([
      0x34,
      0x12,
      0x56,
      0x78,
    ]);
  });

  it("writes negative values as their two's complement pattern", () => {
    expect(Array.from(writeUIntLE(-2, 4))).toEqual([0xfe, 0xff, 0xff, 0xff]);
  });

  it("keeps only the requested number of bytes", () => {
    expect(Array.from(writeUIntLE(0x1234, 1))).toEqual([0x34]);
  });
});
