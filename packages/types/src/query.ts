import type { Chunk, CitationSource } from "./chunk.js";

export type ContextFormat = "plain" | "markdown" | "xml";

export type TruncationSide = "left" | "right";

export interface IndexHit {
  ordinal: number;
  distance: number;
}

export interface ScoredChunk extends IndexHit {
  chunk: Chunk;
}

export interface AssembledContext {
  context: string;
  usedSourceIds: string[];
  tokenCount: number;
  chunks: ScoredChunk[];
}

export type AnswerExtraction =
  | { kind: "found"; answer: string }
  | { kind: "not_found"; raw: string };

export interface AnswerResult {
  question: string;
  answer: string;
  extraction: AnswerExtraction["kind"];
  sources: CitationSource[];
  contextTokens: number;
}

export interface QueryOptions {
  topK?: number;
  maxContextTokens?: number;
}
