import type { EmbeddingProviderType } from "@scholarqa/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { HttpEmbeddingProvider } from "./http-provider.js";
import type { HttpProviderConfig } from "./http-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  cohere?: CohereProviderConfig;
  http?: HttpProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere);
    case "http":
      if (!config.http) {
        throw new Error("HTTP config is required when provider is 'http'");
      }
      return new HttpEmbeddingProvider(config.http);
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
