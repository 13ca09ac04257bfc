export interface IndexHit {
  /** Position of the vector in insertion order */
  position: number;
  score: number;
}

/**
 * Flat inner-product index over L2-normalized vectors (cosine similarity).
 * Fixed dimension; vectors are only appended.
 */
export class SimilarityIndex {
  private readonly vectors: Float32Array[] = [];

  constructor(public readonly dimensions: number) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Invalid index dimension: ${dimensions}`);
    }
  }

  get size(): number {
    return this.vectors.length;
  }

  add(vectors: readonly number[][]): void {
    for (const vector of vectors) {
      this.vectors.push(this.normalize(vector));
    }
  }

  /**
   * Top-K hits with score >= minScore, best first.
   * Equal scores keep insertion order.
   */
  search(query: readonly number[], topK: number, minScore = -1): IndexHit[] {
    const q = this.normalize(query);
    const hits: IndexHit[] = [];

    this.vectors.forEach((vector, position) => {
      let score = 0;
      for (let i = 0; i < this.dimensions; i++) {
        score += vector[i] * q[i];
      }
      if (score >= minScore) {
        hits.push({ position, score });
      }
    });

    return hits
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, Math.max(0, topK));
  }

  private normalize(vector: readonly number[]): Float32Array {
    if (vector.length !== this.dimensions) {
      throw new Error(
        `Vector dimension mismatch: expected ${this.dimensions}, got ${vector.length}`,
      );
    }

    let norm = 0;
    for (const v of vector) {
      norm += v * v;
    }
    norm = Math.sqrt(norm);

    const out = new Float32Array(this.dimensions);
    if (norm === 0) {
      return out;
    }
    for (let i = 0; i < this.dimensions; i++) {
      out[i] = vector[i] / norm;
    }
    return out;
  }
}
