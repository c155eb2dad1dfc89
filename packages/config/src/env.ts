import { z } from "zod";
import type { AppConfig } from "@scholarqa/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const booleanFlag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((val) => val === "true" || val === "1");

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Document source ----------
    SEMANTIC_SCHOLAR_BASE_URL: z
      .string()
      .url("SEMANTIC_SCHOLAR_BASE_URL must be a URL")
      .default("https://api.semanticscholar.org/graph/v1"),
    SEMANTIC_SCHOLAR_API_KEY: z.string().optional(),
    SOURCE_TIMEOUT_MS: positiveInt("30000"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "http"]).default("http"),
    EMBEDDING_BASE_URL: z.string().url("EMBEDDING_BASE_URL must be a URL").default("http://localhost:8080"),
    EMBEDDING_DIMENSIONS: positiveInt("384"),
    EMBEDDING_BATCH_SIZE: positiveInt("32"),

    // ---------- Cohere ----------
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    COHERE_CHAT_MODEL: z.string().default("command-r-08-2024"),

    // ---------- Generation ----------
    GENERATION_PROVIDER: z.enum(["ollama", "cohere"]).default("ollama"),
    OLLAMA_BASE_URL: z.string().url("OLLAMA_BASE_URL must be a URL").default("http://localhost:11434"),
    OLLAMA_MODEL: z.string().min(1).default("llama3.1"),
    MAX_NEW_TOKENS: positiveInt("512"),
    MAX_INPUT_TOKENS: positiveInt("2048"),
    TEMPERATURE: z.string().default("0.7").transform(Number).pipe(z.number().min(0).max(2)),
    DO_SAMPLE: booleanFlag("true"),
    TRUNCATION_SIDE: z.enum(["left", "right"]).default("left"),

    // ---------- Chunking & retrieval ----------
    CHUNK_MIN_WORDS: positiveInt("30"),
    CHUNK_PARAGRAPHS: positiveInt("2"),
    MAX_CONTEXT_TOKENS: positiveInt("1500"),
    DEFAULT_TOP_K: positiveInt("5"),
    MAX_DOCUMENTS: positiveInt("10"),

    // ---------- External calls ----------
    SERVICE_TIMEOUT_MS: positiveInt("60000"),
    SERVICE_MAX_RETRIES: z
      .string()
      .default("2")
      .transform(Number)
      .pipe(z.number().int().nonnegative()),
  })
  .superRefine((env, ctx) => {
    const usesCohere = env.EMBEDDING_PROVIDER === "cohere" || env.GENERATION_PROVIDER === "cohere";
    if (usesCohere && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when a Cohere provider is selected",
      });
    }
    if (env.MAX_CONTEXT_TOKENS >= env.MAX_INPUT_TOKENS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MAX_CONTEXT_TOKENS"],
        message: "MAX_CONTEXT_TOKENS must be smaller than MAX_INPUT_TOKENS",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const cohereApiKey = parsed.COHERE_API_KEY ?? "";

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    source: {
      baseUrl: parsed.SEMANTIC_SCHOLAR_BASE_URL,
      apiKey: parsed.SEMANTIC_SCHOLAR_API_KEY,
      timeoutMs: parsed.SOURCE_TIMEOUT_MS,
    },

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      baseUrl: parsed.EMBEDDING_BASE_URL,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
      cohereApiKey,
      cohereModel: parsed.COHERE_EMBED_MODEL,
    },

    generation: {
      provider: parsed.GENERATION_PROVIDER,
      ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
      ollamaModel: parsed.OLLAMA_MODEL,
      cohereApiKey,
      cohereModel: parsed.COHERE_CHAT_MODEL,
      maxNewTokens: parsed.MAX_NEW_TOKENS,
      maxInputTokens: parsed.MAX_INPUT_TOKENS,
      temperature: parsed.TEMPERATURE,
      sample: parsed.DO_SAMPLE,
      truncationSide: parsed.TRUNCATION_SIDE,
    },

    chunking: {
      minWords: parsed.CHUNK_MIN_WORDS,
      paragraphsPerChunk: parsed.CHUNK_PARAGRAPHS,
    },

    retrieval: {
      topK: parsed.DEFAULT_TOP_K,
      maxContextTokens: parsed.MAX_CONTEXT_TOKENS,
      maxDocuments: parsed.MAX_DOCUMENTS,
    },

    services: {
      timeoutMs: parsed.SERVICE_TIMEOUT_MS,
      maxRetries: parsed.SERVICE_MAX_RETRIES,
    },
  };
}
