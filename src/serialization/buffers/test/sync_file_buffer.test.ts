import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { SyncFileSeekableBuffer } from "../file_buffer_sync.ts";
import { SeekBufferError } from "../buffer_sync.ts";
import { BufferReader } from "../../buffer_reader.ts";
import { BufferWriter } from "../../buffer_writer.ts";
import { unwrap } from "../../result.ts";
import { SeekOrigin } from "../../seek_origin.ts";
import { expectFailure } from "../../test/test_utils.ts";

describe("SyncFileSeekableBuffer", () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "binary-stream-codec-"));
    path = join(dir, "data.bin");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes, seeks and reads back through the file", () => {
    const file = new SyncFileSeekableBuffer(path, "w+");
    expect(file.write(new Uint8Array([1, 2, 3, 4]))).toBe(4);
    expect(file.length()).toBe(4);
    expect(file.seek(1, SeekOrigin.Begin)).toBe(1);
    expect(file.write(new Uint8Array([9]))).toBe(1);
    expect(file.seek(-2, SeekOrigin.Current)).toBe(0);
    expect(file.read(8)).toEqual(new Uint8Array([1, 9, 3, 4]));
    file.close();
    expect(Array.from(readFileSync(path))).toEqual([1, 9, 3, 4]);
  });

  it("throws SeekBufferError past the end of the file", () => {
    writeFileSync(path, new Uint8Array([1, 2]));
    const file = new SyncFileSeekableBuffer(path);
    expect(() => file.seek(3, SeekOrigin.Begin)).toThrow(SeekBufferError);
    file.close();
  });

  it("throws once closed", () => {
    const file = new SyncFileSeekableBuffer(path, "w+");
    file.close();
    file.close();
    expect(() => file.length()).toThrow("File medium has been closed");
  });

  it("carries a codec round trip", () => {
    const out = new SyncFileSeekableBuffer(path, "w+");
    const writer = new BufferWriter(out);
    unwrap(writer.writeU32(9001));
    unwrap(writer.writeString("on disk"));
    unwrap(writer.seek(0, SeekOrigin.Begin));
    unwrap(writer.writeU32(9003));
    expect(writer.length()).toEqual({ ok: true, value: 12 });
    out.close();

    const input = new SyncFileSeekableBuffer(path, "r");
    const reader = new BufferReader(input);
    expect(reader.readU32()).toEqual({ ok: true, value: 9003 });
    expect(reader.readString()).toEqual({ ok: true, value: "on disk" });
    expect(expectFailure(reader.readU8()).kind).toBe("EndOfStream");
    input.close();
  });

  it("reports a write to a read-only file as IOFailure", () => {
    writeFileSync(path, new Uint8Array(0));
    const file = new SyncFileSeekableBuffer(path, "r");
    const writer = new BufferWriter(file);
    expect(expectFailure(writer.writeU8(1)).kind).toBe("IOFailure");
    file.close();
  });
});

