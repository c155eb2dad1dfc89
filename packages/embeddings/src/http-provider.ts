import { ExternalServiceError } from "@scholarqa/errors";
import type { EmbeddingResult } from "@scholarqa/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 384;
const DEFAULT_MODEL = "all-MiniLM-L6-v2";

export interface HttpProviderConfig {
  baseUrl: string;
  model?: string;
  dimensions?: number;
}

interface EmbedResponse {
  embeddings: number[][];
  tokens_used?: number;
}

/**
 * Self-hosted sentence-embedding server.
 * Expects `POST /embed` with `{ texts, model }` returning `{ embeddings, tokens_used }`.
 */
export class HttpEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "http";
  readonly dimensions: number;
  private baseUrl: string;
  private model: string;

  constructor(config: HttpProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.batchEmbed([text], signal);
  }

  async batchEmbed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], model: this.model, tokensUsed: 0, dimensions: this.dimensions };
    }

    const response = await fetch(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts, model: this.model }),
      signal,
    });

    if (!response.ok) {
      throw new ExternalServiceError(
        `Embedding request failed: ${String(response.status)} ${response.statusText}`,
        this.name,
        { details: { status: response.status } },
      );
    }

    const data = (await response.json()) as EmbedResponse;

    if (!Array.isArray(data.embeddings) || data.embeddings.length !== texts.length) {
      throw new ExternalServiceError(
        `Embedding server returned ${String(data.embeddings?.length ?? 0)} vectors for ${String(texts.length)} texts`,
        this.name,
      );
    }

    return {
      embeddings: data.embeddings,
      model: this.model,
      tokensUsed: data.tokens_used ?? 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
