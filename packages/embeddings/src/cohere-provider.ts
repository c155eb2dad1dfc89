import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@scholarqa/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

type InputType = "search_query" | "search_document";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

/**
 * Cohere embeddings. Queries and passages are embedded with their matching input
 * types so that query vectors land near the passages that answer them.
 */
export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.embedAs([text], "search_query", signal);
  }

  async batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.embedAs(texts, "search_document", signal);
  }

  private async embedAs(
    texts: string[],
    inputType: InputType,
    signal?: AbortSignal,
  ): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await this.client.v2.embed(
        {
          texts: batch,
          model: this.model,
          inputType,
          embeddingTypes: ["float"],
        },
        { abortSignal: signal },
      );

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
