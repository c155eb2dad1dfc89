import { ExternalServiceError, RetrievalEmptyError, ValidationError } from "@scholarqa/errors";
import type { IEmbeddingProvider } from "@scholarqa/embeddings";
import type { ScoredChunk } from "@scholarqa/types";
import type { CorpusSnapshot } from "./corpus.js";
import type { ServiceCall } from "./service-call.js";
import { directCall } from "./service-call.js";

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  snapshot: CorpusSnapshot | undefined;
  call?: ServiceCall;
}

/**
 * Retrieval: Question -> Embed -> Exact k-NN -> Chunks, nearest first.
 *
 * No re-ranking and no deduplication; one chunk per source is enforced later
 * by the context assembler.
 */
export async function retrieve(
  question: string,
  k: number,
  deps: RetrievalDependencies,
): Promise<ScoredChunk[]> {
  if (!Number.isInteger(k) || k < 1) {
    throw new ValidationError("Invalid topK", { topK: "must be a positive integer" });
  }

  const { snapshot } = deps;
  if (!snapshot || snapshot.chunks.length === 0) {
    throw new RetrievalEmptyError();
  }

  const call = deps.call ?? directCall;
  const embeddingResult = await call("embed query", (signal) =>
    deps.embeddingProvider.embed(question, signal),
  );
  const queryVector = embeddingResult.embeddings[0];

  if (!queryVector) {
    throw new ExternalServiceError("No embedding returned for query", deps.embeddingProvider.name);
  }

  return snapshot.index.search(queryVector, k).flatMap((hit) => {
    const chunk = snapshot.chunks[hit.ordinal];
    return chunk ? [{ ...hit, chunk }] : [];
  });
}
