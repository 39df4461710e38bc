import { describe, expect, it } from "vitest";

import { BufferReader } from "../buffer_reader.ts";
import { BufferWriter } from "../buffer_writer.ts";
import { encoded7BitIntLength } from "../buffer_constants.ts";
import { unwrap } from "../result.ts";
import { SeekOrigin } from "../seek_origin.ts";

describe("writer and reader together", () => {
  it("patches an earlier field after writing later ones", () => {
    const writer = new BufferWriter();
    unwrap(writer.writeU32(9001));
    unwrap(writer.writeU32(9002));
    unwrap(writer.writeString("Hello World!"));
    unwrap(writer.seek(0, SeekOrigin.Begin));
    unwrap(writer.writeU32(9003));
    const data = unwrap(writer.toUint8Array());
    expect(data.length).toBe(21);

    const reader = new BufferReader(data);
    expect(reader.readU32()).toEqual({ ok: true, value: 9003 });
    expect(reader.readU32()).toEqual({ ok: true, value: 9002 });
    expect(reader.readString()).toEqual({ ok: true, value: "Hello World!" });
    expect(reader.remaining()).toEqual({ ok: true, value: 0 });
  });

  it("reads back a mixed record in write order", () => {
    const writer = new BufferWriter();
    unwrap(writer.writeU8(0xff));
    unwrap(writer.writeU16(0xfffe));
    unwrap(writer.writeI32(-123456));
    unwrap(writer.writeU64(9007199254740993n));
    unwrap(writer.write7BitInt(2097151));
    unwrap(writer.writeString("日本語 \u{1f600}"));
    unwrap(writer.writeString(""));
    unwrap(writer.writeBytes(new Uint8Array([0xde, 0xad])));

    const reader = new BufferReader(unwrap(writer.toUint8Array()));
    expect(unwrap(reader.readU8())).toBe(0xff);
    expect(unwrap(reader.readU16())).toBe(0xfffe);
    expect(unwrap(reader.readI32())).toBe(-123456);
    expect(unwrap(reader.readU64())).toBe(9007199254740993n);
    expect(unwrap(reader.read7BitInt())).toBe(2097151);
    expect(unwrap(reader.readString())).toBe("日本語 \u{1f600}");
    expect(unwrap(reader.readString())).toBe("");
    expect(unwrap(reader.readBytes(2))).toEqual(new Uint8Array([0xde, 0xad]));
    expect(unwrap(reader.remaining())).toBe(0);
  });

  it("round-trips u16 values whose high byte is set", () => {
    for (const value of [0x0100, 0x8000, 0xabcd, 0xffff]) {
      const writer = new BufferWriter();
      unwrap(writer.writeU16(value));
      const reader = new BufferReader(unwrap(writer.toUint8Array()));
      expect(unwrap(reader.readU16())).toBe(value);
    }
  });

  it("uses the fewest 7-bit groups for each magnitude", () => {
    const cases: Array<[number, number]> = [
      [0, 1],
      [127, 1],
      [128, 2],
      [16383, 2],
      [16384, 3],
      [2097151, 3],
      [2097152, 4],
      [268435455, 4],
      [268435456, 5],
      [0xffffffff, 5],
    ];
    for (const [value, size] of cases) {
      const writer = new BufferWriter();
      expect(writer.write7BitInt(value)).toEqual({ ok: true, value: size });
      expect(encoded7BitIntLength(value)).toBe(size);
      const reader = new BufferReader(unwrap(writer.toUint8Array()));
      expect(reader.read7BitUInt()).toEqual({ ok: true, value });
      expect(reader.position()).toEqual({ ok: true, value: size });
    }
  });

  it("reads a block by offset while walking the record", () => {
    const writer = new BufferWriter();
    unwrap(writer.writeU32(0));
    unwrap(writer.writeString("payload"));
    unwrap(writer.seek(0, SeekOrigin.Begin));
    unwrap(writer.writeU32(5));

    const reader = new BufferReader(unwrap(writer.toUint8Array()));
    const offset = unwrap(reader.readU32());
    const peeked = unwrap(reader.readBytesAt(offset, 7));
    expect(new TextDecoder().decode(peeked)).toBe("payload");
    expect(unwrap(reader.readString())).toBe("payload");
  });
});
