import type { IndexHit } from "@scholarqa/types";

/**
 * A read-only nearest-neighbour index over one corpus snapshot. Ordinal `i`
 * is the position of the `i`-th vector the index was built from.
 */
export interface IVectorIndex {
  readonly size: number;
  readonly dimensions: number;
  search(vector: readonly number[], k: number): IndexHit[];
}
