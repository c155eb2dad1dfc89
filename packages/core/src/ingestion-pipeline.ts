import {
  SourceUnavailableError,
  ValidationError,
  describeError,
} from "@scholarqa/errors";
import type { IChunker } from "@scholarqa/chunker";
import type { IEmbeddingProvider } from "@scholarqa/embeddings";
import type { Logger } from "@scholarqa/logger";
import type { IDocumentSource, IParser } from "@scholarqa/sources";
import { buildIndex } from "@scholarqa/vector-store";
import type {
  DocumentRef,
  IngestionFailure,
  IngestionReport,
  Paper,
  PaperDetails,
} from "@scholarqa/types";
import { createSnapshot } from "./corpus.js";
import type { CorpusSnapshot } from "./corpus.js";
import type { ServiceCall } from "./service-call.js";
import { directCall } from "./service-call.js";

export interface IngestionDependencies {
  source: IDocumentSource;
  getParser: (mimeType: string) => IParser;
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  logger: Logger;
  /** Texts per embedding request. */
  batchSize?: number;
  /** Wraps each full-text download. */
  downloadCall?: ServiceCall;
  /** Wraps each embedding request. */
  embedCall?: ServiceCall;
}

export interface FetchResult {
  papers: Paper[];
  report: IngestionReport;
}

/**
 * Acquisition: Search -> Details -> Download -> Parse, one document at a time.
 *
 * A document that cannot be turned into text is recorded as a failure and
 * skipped; only an invalid request aborts the run. The report's `chunkCount`
 * is filled in once the papers are indexed.
 */
export async function fetchPapers(
  topic: string,
  maxDocuments: number,
  deps: IngestionDependencies,
): Promise<FetchResult> {
  if (topic.trim().length === 0) {
    throw new ValidationError("Topic must not be empty", { topic: "required" });
  }
  if (!Number.isInteger(maxDocuments) || maxDocuments < 1) {
    throw new ValidationError("Invalid maxDocuments", { maxDocuments: "must be a positive integer" });
  }

  const { logger } = deps;
  const failures: IngestionFailure[] = [];
  const papers: Paper[] = [];

  let refs: DocumentRef[];
  try {
    refs = await deps.source.search(topic, maxDocuments);
  } catch (error: unknown) {
    logger.warn({ err: error, topic }, "Search failed, continuing with no results");
    refs = [];
  }

  let details = new Map<string, PaperDetails>();
  try {
    const resolved = refs.length > 0 ? await deps.source.fetchDetails(refs.map((r) => r.id)) : [];
    details = new Map(resolved.map((d) => [d.id, d]));
  } catch (error: unknown) {
    logger.warn({ err: error, topic, documents: refs.length }, "Fetching paper details failed");
  }

  for (const ref of refs) {
    try {
      const paper = await fetchPaper(ref, details.get(ref.id), deps);
      papers.push(paper);
      logger.info({ documentId: ref.id, title: ref.title }, "Document ingested");
    } catch (error: unknown) {
      const reason = describeError(error);
      failures.push({ documentId: ref.id, title: ref.title, reason });
      logger.warn({ documentId: ref.id, title: ref.title, reason }, "Document skipped");
    }
  }

  return {
    papers,
    report: {
      topic,
      attempted: refs.length,
      succeeded: papers.length,
      failed: failures.length,
      chunkCount: 0,
      failures,
    },
  };
}

async function fetchPaper(
  ref: DocumentRef,
  details: PaperDetails | undefined,
  deps: IngestionDependencies,
): Promise<Paper> {
  if (!details) {
    throw new SourceUnavailableError("No details available", ref.id);
  }
  const { pdfUrl } = details;
  if (!pdfUrl) {
    throw new SourceUnavailableError("No open-access full text", ref.id);
  }

  const call = deps.downloadCall ?? directCall;
  try {
    const artifact = await call(`download ${ref.id}`, (signal) =>
      deps.source.download(pdfUrl, signal),
    );
    const parsed = await deps.getParser(artifact.mimeType).parse(artifact.data, artifact.mimeType);

    if (parsed.text.trim().length === 0) {
      throw new SourceUnavailableError("No text could be extracted", ref.id);
    }

    return Object.freeze({
      id: details.id,
      title: details.title,
      hasFullText: true,
      text: parsed.text,
      metadata: Object.freeze({ ...details.metadata }),
    });
  } catch (error: unknown) {
    if (error instanceof SourceUnavailableError) throw error;
    throw new SourceUnavailableError(describeError(error), ref.id, { cause: error });
  }
}

/**
 * Indexing: Chunk -> Embed (batched) -> Flat index, producing a snapshot that
 * replaces the previous corpus in one step.
 */
export async function buildCorpus(
  papers: readonly Paper[],
  deps: Pick<IngestionDependencies, "chunker" | "embeddingProvider" | "logger" | "batchSize" | "embedCall">,
): Promise<CorpusSnapshot> {
  const chunks = papers.flatMap((paper) => deps.chunker.chunk(paper));

  const index = await buildIndex(
    chunks.map((c) => c.content),
    deps.embeddingProvider,
    {
      batchSize: deps.batchSize,
      call: deps.embedCall,
      onBatch: ({ embedded, total }) => {
        deps.logger.debug({ embedded, total }, "Embedded chunk batch");
      },
    },
  );

  return createSnapshot(papers, chunks, index);
}
