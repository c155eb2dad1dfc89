import type { Chunk, ChunkStrategy, Paper } from "@scholarqa/types";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(paper: Paper): Chunk[];
}
