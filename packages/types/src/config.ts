import type { ChunkingConfig } from "./chunk.js";
import type { TruncationSide } from "./query.js";

export type EmbeddingProviderType = "cohere" | "http";

export type GenerationProviderType = "ollama" | "cohere";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  source: SourceConfig;
  embeddings: EmbeddingsConfig;
  generation: GenerationConfig;
  chunking: ChunkingConfig;
  retrieval: RetrievalConfig;
  services: ServiceCallConfig;
}

export interface SourceConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export interface EmbeddingsConfig {
  provider: EmbeddingProviderType;
  baseUrl: string;
  dimensions: number;
  batchSize: number;
  cohereApiKey: string;
  cohereModel: string;
}

export interface GenerationConfig {
  provider: GenerationProviderType;
  ollamaBaseUrl: string;
  ollamaModel: string;
  cohereApiKey: string;
  cohereModel: string;
  maxNewTokens: number;
  maxInputTokens: number;
  temperature: number;
  sample: boolean;
  truncationSide: TruncationSide;
}

export interface RetrievalConfig {
  topK: number;
  maxContextTokens: number;
  maxDocuments: number;
}

export interface ServiceCallConfig {
  timeoutMs: number;
  maxRetries: number;
}
