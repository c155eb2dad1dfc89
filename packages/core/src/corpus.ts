import type { Chunk, CorpusStats, Paper } from "@scholarqa/types";
import type { IVectorIndex } from "@scholarqa/vector-store";

/**
 * Everything a query reads. Built once per ingestion and swapped in whole;
 * `chunks[i]` is the chunk stored at ordinal `i` of `index`.
 */
export interface CorpusSnapshot {
  readonly papers: readonly Paper[];
  readonly chunks: readonly Chunk[];
  readonly index: IVectorIndex;
}

export function createSnapshot(
  papers: readonly Paper[],
  chunks: readonly Chunk[],
  index: IVectorIndex,
): CorpusSnapshot {
  if (index.size !== chunks.length) {
    throw new Error(
      `Index holds ${String(index.size)} vectors for ${String(chunks.length)} chunks`,
    );
  }
  return Object.freeze({
    papers: Object.freeze([...papers]),
    chunks: Object.freeze([...chunks]),
    index,
  });
}

export function snapshotStats(snapshot: CorpusSnapshot | undefined): CorpusStats {
  if (!snapshot) return { papers: 0, chunks: 0, dimensions: 0 };
  return {
    papers: snapshot.papers.length,
    chunks: snapshot.chunks.length,
    dimensions: snapshot.index.dimensions,
  };
}
