import type { EmbeddingResult } from "@scholarqa/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** Embed a single search query. Aborting `signal` cancels the request. */
  embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult>;
  /** Embed document passages, one vector per input in input order. */
  batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
