export interface NeighborSearchResult {
  /** Squared L2 distances, nearest first. */
  distances: number[];
  /** Row positions matching `distances`. */
  positions: number[];
}

export interface VectorIndex {
  readonly dimension: number;
  readonly size: number;
  add(vectors: Float32Array[]): void;
  search(query: Float32Array, k: number): NeighborSearchResult;
  serialize(): Buffer;
}
