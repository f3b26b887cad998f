const MAGIC = "AIDX";
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;

export type Neighbor = {
  position: number;   // insertion rank, -1 for padding
  distance: number;   // Euclidean distance, Infinity for padding
};

/**
 * Exact L2 nearest-neighbour index over equal-length float32 rows
 * Linear scan: catalogs hold hundreds to low thousands of entries
 */
export class FlatL2Index {
  readonly dimension: number;
  private data: Float32Array;
  private rows: number = 0;

  constructor(dimension: number, capacity: number = 16) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new Error(`Invalid index dimension: ${dimension}`);
    }
    this.dimension = dimension;
    this.data = new Float32Array(dimension * Math.max(1, capacity));
  }

  get size(): number {
    return this.rows;
  }

  /**
   * Append a vector, returns its position
   */
  add(vector: ArrayLike<number>): number {
    if (vector.length !== this.dimension) {
      throw new Error(`Vector dimension ${vector.length} does not match index dimension ${this.dimension}`);
    }

    const needed = (this.rows + 1) * this.dimension;
    if (needed > this.data.length) {
      const grown = new Float32Array(Math.max(needed, this.data.length * 2));
      grown.set(this.data);
      this.data = grown;
    }

    this.data.set(vector, this.rows * this.dimension);
    return this.rows++;
  }

  /**
   * Copy of the row at a position
   */
  vectorAt(position: number): Float32Array {
    if (position < 0 || position >= this.rows) {
      throw new RangeError(`Position ${position} outside index of size ${this.rows}`);
    }
    const start = position * this.dimension;
    return this.data.slice(start, start + this.dimension);
  }

  /**
   * k nearest rows by Euclidean distance, closest first, ties by position
   * Pads with { position: -1, distance: Infinity } when k exceeds the row count
   */
  search(query: ArrayLike<number>, k: number = 1): Neighbor[] {
    if (query.length !== this.dimension) {
      throw new Error(`Query dimension ${query.length} does not match index dimension ${this.dimension}`);
    }

    // Compare at stored precision so an indexed vector matches itself exactly
    const q = Float32Array.from(query);
    const scored: Neighbor[] = [];
    for (let row = 0; row < this.rows; row++) {
      const offset = row * this.dimension;
      let sum = 0;
      for (let d = 0; d < this.dimension; d++) {
        const diff = (this.data[offset + d] ?? 0) - (q[d] ?? 0);
        sum += diff * diff;
      }
      scored.push({ position: row, distance: Math.sqrt(sum) });
    }

    scored.sort((a, b) => a.distance - b.distance || a.position - b.position);
    const results = scored.slice(0, Math.max(0, k));
    while (results.length < k) {
      results.push({ position: -1, distance: Infinity });
    }
    return results;
  }

  /**
   * Binary layout: magic, uint32 version, uint32 dimension, uint32 count,
   * then count * dimension little-endian float32 values
   */
  serialize(): Buffer {
    const floats = this.rows * this.dimension;
    const buffer = Buffer.alloc(HEADER_BYTES + floats * 4);
    buffer.write(MAGIC, 0, "ascii");
    buffer.writeUInt32LE(FORMAT_VERSION, 4);
    buffer.writeUInt32LE(this.dimension, 8);
    buffer.writeUInt32LE(this.rows, 12);
    for (let i = 0; i < floats; i++) {
      buffer.writeFloatLE(this.data[i] ?? 0, HEADER_BYTES + i * 4);
    }
    return buffer;
  }

  static deserialize(buffer: Buffer): FlatL2Index {
    if (buffer.length < HEADER_BYTES || buffer.toString("ascii", 0, 4) !== MAGIC) {
      throw new Error("Not an index file");
    }
    const version = buffer.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new Error(`Unsupported index format version ${version}`);
    }
    const dimension = buffer.readUInt32LE(8);
    const count = buffer.readUInt32LE(12);
    const expected = HEADER_BYTES + dimension * count * 4;
    if (buffer.length !== expected) {
      throw new Error(`Index file is ${buffer.length} bytes, expected ${expected}`);
    }

    const index = new FlatL2Index(dimension, count);
    const row = new Float32Array(dimension);
    for (let r = 0; r < count; r++) {
      for (let d = 0; d < dimension; d++) {
        row[d] = buffer.readFloatLE(HEADER_BYTES + (r * dimension + d) * 4);
      }
      index.add(row);
    }
    return index;
  }
}
