import { ExternalServiceError, ValidationError } from "@scholarqa/errors";
import type { IEmbeddingProvider } from "@scholarqa/embeddings";
import { FlatL2Index } from "./flat-index.js";

export const DEFAULT_BATCH_SIZE = 32;

export interface BuildIndexOptions {
  /** Texts per embedding request. Affects throughput only, never the result. */
  batchSize?: number;
  /** Wraps each embedding request, e.g. with a timeout and retries. */
  call?: <T>(operation: string, fn: (signal: AbortSignal) => Promise<T>) => Promise<T>;
  onBatch?: (progress: { embedded: number; total: number }) => void;
}

const direct = <T>(_operation: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> =>
  fn(new AbortController().signal);

/**
 * Embed every text in order and load the vectors into a new {@link FlatL2Index}
 * in one step. Row `i` of the index is the embedding of `texts[i]`.
 */
export async function buildIndex(
  texts: readonly string[],
  provider: IEmbeddingProvider,
  options: BuildIndexOptions = {},
): Promise<FlatL2Index> {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const call = options.call ?? direct;

  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ValidationError("Invalid batch size", { batchSize: "must be a positive integer" });
  }

  const vectors: number[][] = [];

  for (let start = 0; start < texts.length; start += batchSize) {
    const batch = texts.slice(start, start + batchSize);
    const result = await call(`embed batch ${String(start / batchSize + 1)}`, (signal) =>
      provider.batchEmbed(batch, signal),
    );

    if (result.embeddings.length !== batch.length) {
      throw new ExternalServiceError(
        `Expected ${String(batch.length)} embeddings, received ${String(result.embeddings.length)}`,
        provider.name,
      );
    }

    vectors.push(...result.embeddings);
    options.onBatch?.({ embedded: vectors.length, total: texts.length });
  }

  return new FlatL2Index(vectors);
}
