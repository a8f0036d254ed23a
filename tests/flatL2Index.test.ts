import { describe, expect, it } from "vitest";
import { FlatL2Index, IndexFormatError } from "../src/infra/store/flatL2Index.js";

function vec(...values: number[]): Float32Array {
  return Float32Array.from(values);
}

describe("FlatL2Index", () => {
  it("returns nearest rows by squared euclidean distance", () => {
    const index = new FlatL2Index(2);
    index.add([vec(0, 0), vec(3, 4), vec(1, 1)]);

    const result = index.search(vec(0, 0), 3);
    expect(result.positions).toEqual([0, 2, 1]);
    expect(result.distances).toEqual([0, 2, 25]);
  });

  it("clamps k to the number of stored rows", () => {
    const index = new FlatL2Index(2);
    index.add([vec(1, 0), vec(0, 1)]);

    const result = index.search(vec(1, 0), 3);
    expect(result.positions).toEqual([0, 1]);
    expect(result.distances).toEqual([0, 2]);
  });

  it("breaks distance ties by row position", () => {
    const index = new FlatL2Index(2);
    index.add([vec(0, 1), vec(-1, 0), vec(1, 0)]);

    const result = index.search(vec(0, 0), 3);
    expect(result.positions).toEqual([0, 1, 2]);
    expect(result.distances).toEqual([1, 1, 1]);
  });

  it("returns no hits for an empty index", () => {
    const index = new FlatL2Index(3);
    expect(index.search(vec(1, 2, 3), 3)).toEqual({ distances: [], positions: [] });
  });

  it("keeps rows in insertion order across bulk adds", () => {
    const index = new FlatL2Index(2);
    index.add([vec(1, 2)]);
    index.add([vec(3, 4), vec(5, 6)]);

    expect(index.size).toBe(3);
    expect(Array.from(index.vectorAt(0))).toEqual([1, 2]);
    expect(Array.from(index.vectorAt(2))).toEqual([5, 6]);
    expect(() => index.vectorAt(3)).toThrow("out of range");
  });

  it("rejects vectors with the wrong dimension", () => {
    const index = new FlatL2Index(3);
    expect(() => index.add([vec(1, 2, 3), vec(1, 2)])).toThrow(
      "Vector 1 has dimension 2, index expects 3.",
    );
    expect(index.size).toBe(0);
    expect(() => index.search(vec(1), 1)).toThrow("Query has dimension 1, index expects 3.");
  });

  it("restores an identical index from its serialized form", () => {
    const index = new FlatL2Index(3);
    index.add([vec(0.5, -1.25, 2), vec(4, 0, 0.75)]);

    const buffer = index.serialize();
    expect(buffer.length).toBe(16 + 2 * 3 * 4);
    expect(buffer.toString("ascii", 0, 4)).toBe("FL2I");

    const restored = FlatL2Index.deserialize(buffer);
    expect(restored.dimension).toBe(3);
    expect(restored.size).toBe(2);
    expect(Array.from(restored.vectorAt(0))).toEqual([0.5, -1.25, 2]);
    expect(restored.search(vec(4, 0, 0.75), 1).positions).toEqual([1]);
  });

  it("rejects buffers that are not index files", () => {
    const foreign = Buffer.alloc(16);
    foreign.write("XXXX", 0, "ascii");
    expect(() => FlatL2Index.deserialize(foreign)).toThrow(IndexFormatError);
    expect(() => FlatL2Index.deserialize(Buffer.alloc(4))).toThrow("too short");
  });

  it("rejects a truncated vector payload", () => {
    const index = new FlatL2Index(2);
    index.add([vec(1, 2), vec(3, 4)]);
    const truncated = index.serialize().subarray(0, 16 + 3 * 4);

    expect(() => FlatL2Index.deserialize(truncated)).toThrow(
      "Index file size mismatch (28 != 32 bytes).",
    );
  });
});
