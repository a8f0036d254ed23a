import { NeighborSearchResult, VectorIndex } from "../../domain/vectorIndex.js";

const MAGIC = "FL2I";
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;
const FLOAT_BYTES = 4;

export class IndexFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IndexFormatError";
  }
}

/**
 * Exact nearest-neighbour index over squared Euclidean distance.
 * Vectors are stored row-major in one growable Float32Array; row `i` is the
 * i-th vector ever added.
 */
export class FlatL2Index implements VectorIndex {
  private data: Float32Array;

  private count = 0;

  constructor(readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Index dimension must be a positive integer, got ${dimension}.`);
    }
    this.data = new Float32Array(0);
  }

  get size(): number {
    return this.count;
  }

  add(vectors: Float32Array[]): void {
    if (vectors.length === 0) {
      return;
    }

    for (const [row, vector] of vectors.entries()) {
      if (vector.length !== this.dimension) {
        throw new Error(
          `Vector ${row} has dimension ${vector.length}, index expects ${this.dimension}.`,
        );
      }
    }

    const next = new Float32Array((this.count + vectors.length) * this.dimension);
    next.set(this.data.subarray(0, this.count * this.dimension));
    let offset = this.count * this.dimension;
    for (const vector of vectors) {
      next.set(vector, offset);
      offset += this.dimension;
    }

    this.data = next;
    this.count += vectors.length;
  }

  search(query: Float32Array, k: number): NeighborSearchResult {
    if (query.length !== this.dimension) {
      throw new Error(
        `Query has dimension ${query.length}, index expects ${this.dimension}.`,
      );
    }

    const limit = Math.min(Math.max(Math.floor(k), 0), this.count);
    if (limit === 0) {
      return { distances: [], positions: [] };
    }

    const scored: Array<{ position: number; distance: number }> = [];
    for (let row = 0; row < this.count; row += 1) {
      scored.push({ position: row, distance: this.squaredDistance(query, row) });
    }

    scored.sort((a, b) => a.distance - b.distance || a.position - b.position);
    const top = scored.slice(0, limit);

    return {
      distances: top.map((item) => item.distance),
      positions: top.map((item) => item.position),
    };
  }

  vectorAt(position: number): Float32Array {
    if (!Number.isInteger(position) || position < 0 || position >= this.count) {
      throw new RangeError(`Row ${position} is out of range (size ${this.count}).`);
    }
    const start = position * this.dimension;
    return this.data.slice(start, start + this.dimension);
  }

  serialize(): Buffer {
    const payloadBytes = this.count * this.dimension * FLOAT_BYTES;
    const buffer = Buffer.alloc(HEADER_BYTES + payloadBytes);

    buffer.write(MAGIC, 0, "ascii");
    buffer.writeUInt32LE(FORMAT_VERSION, 4);
    buffer.writeUInt32LE(this.dimension, 8);
    buffer.writeUInt32LE(this.count, 12);

    let offset = HEADER_BYTES;
    for (let i = 0; i < this.count * this.dimension; i += 1) {
      buffer.writeFloatLE(this.data[i], offset);
      offset += FLOAT_BYTES;
    }

    return buffer;
  }

  static deserialize(buffer: Buffer): FlatL2Index {
    if (buffer.length < HEADER_BYTES) {
      throw new IndexFormatError("Index file is too short to contain a header.");
    }

    const magic = buffer.toString("ascii", 0, 4);
    if (magic !== MAGIC) {
      throw new IndexFormatError(`Unrecognized index file signature: ${JSON.stringify(magic)}.`);
    }

    const version = buffer.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new IndexFormatError(
        `Unsupported index format version: ${version}. Expected ${FORMAT_VERSION}.`,
      );
    }

    const dimension = buffer.readUInt32LE(8);
    const count = buffer.readUInt32LE(12);
    if (dimension === 0) {
      throw new IndexFormatError("Index file declares a zero dimension.");
    }

    const expectedBytes = HEADER_BYTES + count * dimension * FLOAT_BYTES;
    if (buffer.length !== expectedBytes) {
      throw new IndexFormatError(
        `Index file size mismatch (${buffer.length} != ${expectedBytes} bytes).`,
      );
    }

    const vectors: Float32Array[] = [];
    let offset = HEADER_BYTES;
    for (let row = 0; row < count; row += 1) {
      const vector = new Float32Array(dimension);
      for (let col = 0; col < dimension; col += 1) {
        vector[col] = buffer.readFloatLE(offset);
        offset += FLOAT_BYTES;
      }
      vectors.push(vector);
    }

    const index = new FlatL2Index(dimension);
    index.add(vectors);
    return index;
  }

  private squaredDistance(query: Float32Array, row: number): number {
    const start = row * this.dimension;
    let sum = 0;
    for (let col = 0; col < this.dimension; col += 1) {
      const diff = query[col] - this.data[start + col];
      sum += diff * diff;
    }
    return sum;
  }
}
