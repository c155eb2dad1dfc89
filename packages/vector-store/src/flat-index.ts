import { ValidationError } from "@scholarqa/errors";
import type { IndexHit } from "@scholarqa/types";
import type { IVectorIndex } from "./vector-store.interface.js";
import { squaredL2 } from "./distance.js";

/**
 * Exhaustive (exact) index using squared Euclidean distance.
 *
 * Every query scans the full matrix, which is what a corpus of tens to a few
 * hundred chunks calls for. Results are sorted by ascending distance, equal
 * distances by ascending ordinal, so identical inputs always give identical
 * output.
 */
export class FlatL2Index implements IVectorIndex {
  readonly size: number;
  readonly dimensions: number;
  private readonly vectors: readonly (readonly number[])[];

  constructor(vectors: readonly (readonly number[])[]) {
    const first = vectors[0];
    this.dimensions = first ? first.length : 0;

    vectors.forEach((vector, ordinal) => {
      if (vector.length !== this.dimensions) {
        throw new ValidationError("Embedding dimensions differ within one index", {
          [`vectors[${String(ordinal)}]`]: `expected ${String(this.dimensions)} dimensions, got ${String(vector.length)}`,
        });
      }
      if (!vector.every(Number.isFinite)) {
        throw new ValidationError("Embedding contains non-finite values", {
          [`vectors[${String(ordinal)}]`]: "must contain finite numbers only",
        });
      }
    });

    this.vectors = Object.freeze(vectors.map((vector) => Object.freeze([...vector])));
    this.size = this.vectors.length;
  }

  search(vector: readonly number[], k: number): IndexHit[] {
    if (k <= 0 || this.size === 0) return [];

    if (vector.length !== this.dimensions) {
      throw new ValidationError("Query vector has the wrong dimensions", {
        vector: `expected ${String(this.dimensions)} dimensions, got ${String(vector.length)}`,
      });
    }

    const hits = this.vectors.map((row, ordinal) => ({ ordinal, distance: squaredL2(row, vector) }));
    hits.sort((a, b) => a.distance - b.distance || a.ordinal - b.ordinal);

    return hits.slice(0, k);
  }
}
