import { ParagraphChunker } from "@scholarqa/chunker";
import { ResearchAssistant } from "@scholarqa/core";
import { createEmbeddingProvider } from "@scholarqa/embeddings";
import type { EmbeddingFactoryConfig } from "@scholarqa/embeddings";
import { EstimatingTokenizer, createGenerativeModel } from "@scholarqa/generation";
import type { GenerativeModelFactoryConfig } from "@scholarqa/generation";
import type { Logger } from "@scholarqa/logger";
import { SemanticScholarSource, getParser } from "@scholarqa/sources";
import type { AppConfig } from "@scholarqa/types";

export function embeddingConfig(config: AppConfig): EmbeddingFactoryConfig {
  const { embeddings } = config;
  return embeddings.provider === "cohere"
    ? {
        provider: "cohere",
        cohere: { apiKey: embeddings.cohereApiKey, model: embeddings.cohereModel },
      }
    : {
        provider: "http",
        http: { baseUrl: embeddings.baseUrl, dimensions: embeddings.dimensions },
      };
}

export function generationConfig(config: AppConfig): GenerativeModelFactoryConfig {
  const { generation } = config;
  return generation.provider === "cohere"
    ? {
        provider: "cohere",
        cohere: { apiKey: generation.cohereApiKey, model: generation.cohereModel },
      }
    : {
        provider: "ollama",
        ollama: { baseUrl: generation.ollamaBaseUrl, model: generation.ollamaModel },
      };
}

/**
 * Wire the production services described by `config` into an assistant.
 */
export function createAssistant(config: AppConfig, logger: Logger): ResearchAssistant {
  const source = new SemanticScholarSource({
    baseUrl: config.source.baseUrl,
    apiKey: config.source.apiKey,
    timeoutMs: config.source.timeoutMs,
    onCircuitStateChange: (circuit, state) => {
      logger.warn({ circuit, state }, "Circuit state changed");
    },
  });

  const { generation } = config;

  return new ResearchAssistant(
    {
      source,
      getParser,
      chunker: new ParagraphChunker(config.chunking),
      embeddingProvider: createEmbeddingProvider(embeddingConfig(config)),
      model: createGenerativeModel(generationConfig(config)),
      tokenizer: new EstimatingTokenizer(),
      logger,
    },
    {
      topK: config.retrieval.topK,
      maxContextTokens: config.retrieval.maxContextTokens,
      maxDocuments: config.retrieval.maxDocuments,
      batchSize: config.embeddings.batchSize,
      timeoutMs: config.services.timeoutMs,
      maxRetries: config.services.maxRetries,
      generation: {
        maxInputTokens: generation.maxInputTokens,
        maxNewTokens: generation.maxNewTokens,
        temperature: generation.temperature,
        sample: generation.sample,
        truncationSide: generation.truncationSide,
      },
    },
  );
}
