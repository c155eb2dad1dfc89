import { EmptyCorpusError, ValidationError } from "@scholarqa/errors";
import type { IChunker } from "@scholarqa/chunker";
import type { IEmbeddingProvider } from "@scholarqa/embeddings";
import type { IGenerativeModel, ITokenizer } from "@scholarqa/generation";
import { createChildLogger } from "@scholarqa/logger";
import type { Logger } from "@scholarqa/logger";
import type { IDocumentSource, IParser } from "@scholarqa/sources";
import type {
  AnswerResult,
  ContextFormat,
  CorpusStats,
  IngestionReport,
  Paper,
  QueryOptions,
} from "@scholarqa/types";
import { AnswerGenerator, extractionText } from "./answer-generator.js";
import type { AnswerGeneratorOptions } from "./answer-generator.js";
import { assembleContext } from "./context-assembler.js";
import { snapshotStats } from "./corpus.js";
import type { CorpusSnapshot } from "./corpus.js";
import { buildCorpus, fetchPapers } from "./ingestion-pipeline.js";
import type { IngestionDependencies } from "./ingestion-pipeline.js";
import { retrieve } from "./retriever.js";
import { timedCall, timeoutOnly } from "./service-call.js";
import type { ServiceCall } from "./service-call.js";

export interface ResearchAssistantDependencies {
  source: IDocumentSource;
  getParser: (mimeType: string) => IParser;
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  model: IGenerativeModel;
  tokenizer: ITokenizer;
  logger: Logger;
}

export interface ResearchAssistantOptions {
  topK: number;
  maxContextTokens: number;
  maxDocuments: number;
  /** Texts per embedding request. */
  batchSize: number;
  contextFormat: ContextFormat;
  /** Bound on each external call: download, embedding request or generation. */
  timeoutMs: number;
  /** Retries for timed-out downloads and embedding requests. */
  maxRetries: number;
  retryBaseDelayMs: number;
  generation: Partial<AnswerGeneratorOptions>;
}

export const DEFAULT_ASSISTANT_OPTIONS: ResearchAssistantOptions = {
  topK: 5,
  maxContextTokens: 1500,
  maxDocuments: 10,
  batchSize: 32,
  contextFormat: "plain",
  timeoutMs: 60_000,
  maxRetries: 2,
  retryBaseDelayMs: 1_000,
  generation: {},
};

/**
 * Question answering over a topic's papers.
 *
 * `ingest` replaces the corpus; queries read whichever snapshot is current when
 * they start. Meant for one session at a time: there is no locking between
 * concurrent ingests.
 */
export class ResearchAssistant {
  private snapshot: CorpusSnapshot | undefined;
  private readonly options: ResearchAssistantOptions;
  private readonly logger: Logger;
  private readonly serviceCall: ServiceCall;
  private readonly generator: AnswerGenerator;

  constructor(
    private readonly deps: ResearchAssistantDependencies,
    options: Partial<ResearchAssistantOptions> = {},
  ) {
    this.options = { ...DEFAULT_ASSISTANT_OPTIONS, ...options };
    this.logger = createChildLogger(deps.logger, { component: "assistant" });

    this.serviceCall = timedCall({
      timeoutMs: this.options.timeoutMs,
      maxRetries: this.options.maxRetries,
      baseDelayMs: this.options.retryBaseDelayMs,
      onRetry: (operation, { attempt, maxRetries, delayMs }) => {
        this.logger.warn({ operation, attempt, maxRetries, delayMs }, "Call timed out, retrying");
      },
    });

    const { maxContextTokens } = this.options;
    const maxInputTokens = this.options.generation.maxInputTokens;
    if (maxInputTokens !== undefined && maxContextTokens >= maxInputTokens) {
      throw new ValidationError("Context budget must be smaller than the model input window", {
        maxContextTokens: `must be less than maxInputTokens (${String(maxInputTokens)})`,
      });
    }

    this.generator = new AnswerGenerator(
      deps.model,
      deps.tokenizer,
      this.options.generation,
      timeoutOnly(this.options.timeoutMs),
    );
  }

  /** Discard papers, chunks and index. */
  resetCorpus(): void {
    this.snapshot = undefined;
  }

  /**
   * Search `topic`, fetch up to `maxDocuments` papers and index them. Documents
   * that cannot be fetched are reported, not thrown.
   *
   * @throws {EmptyCorpusError} when no document yields a chunk; the report is in `details`.
   */
  async ingest(topic: string, maxDocuments = this.options.maxDocuments): Promise<IngestionReport> {
    this.resetCorpus();
    const log = this.logger.child({ topic });

    const { papers, report } = await fetchPapers(topic, maxDocuments, this.ingestionDeps(log));
    const { chunkCount } = await this.indexPapers(papers);
    const finalReport: IngestionReport = { ...report, chunkCount };

    log.info(
      {
        attempted: report.attempted,
        succeeded: report.succeeded,
        failed: report.failed,
        chunkCount,
      },
      "Ingestion finished",
    );

    if (chunkCount === 0) {
      throw new EmptyCorpusError(`No usable chunks were produced for "${topic}"`, {
        details: { report: finalReport },
      });
    }
    return finalReport;
  }

  /** Chunk and index already-fetched papers, replacing the current corpus. */
  async indexPapers(papers: readonly Paper[]): Promise<{ chunkCount: number }> {
    const snapshot = await buildCorpus(papers, this.ingestionDeps(this.logger));
    this.snapshot = snapshot;
    return { chunkCount: snapshot.chunks.length };
  }

  async ask(question: string, topK = this.options.topK): Promise<string> {
    const result = await this.query(question, { topK });
    return result.answer;
  }

  async query(question: string, options: QueryOptions = {}): Promise<AnswerResult> {
    if (question.trim().length === 0) {
      throw new ValidationError("Question must not be empty", { question: "required" });
    }
    const topK = options.topK ?? this.options.topK;
    const maxTokens = options.maxContextTokens ?? this.options.maxContextTokens;
    if (!Number.isInteger(maxTokens) || maxTokens < 1) {
      throw new ValidationError("Invalid maxContextTokens", {
        maxContextTokens: "must be a positive integer",
      });
    }

    const candidates = await retrieve(question, topK, {
      embeddingProvider: this.deps.embeddingProvider,
      snapshot: this.snapshot,
      call: this.serviceCall,
    });
    const assembled = assembleContext(candidates, {
      maxTokens,
      tokenizer: this.deps.tokenizer,
      format: this.options.contextFormat,
    });
    const extraction = await this.generator.generate(question, assembled.context);

    this.logger.debug(
      {
        candidates: candidates.length,
        used: assembled.chunks.length,
        contextTokens: assembled.tokenCount,
        extraction: extraction.kind,
      },
      "Question answered",
    );

    return {
      question,
      answer: extractionText(extraction),
      extraction: extraction.kind,
      sources: assembled.chunks.map(({ chunk }) => chunk.source),
      contextTokens: assembled.tokenCount,
    };
  }

  stats(): CorpusStats {
    return snapshotStats(this.snapshot);
  }

  private ingestionDeps(logger: Logger): IngestionDependencies {
    return {
      source: this.deps.source,
      getParser: this.deps.getParser,
      chunker: this.deps.chunker,
      embeddingProvider: this.deps.embeddingProvider,
      logger,
      batchSize: this.options.batchSize,
      downloadCall: this.serviceCall,
      embedCall: this.serviceCall,
    };
  }
}
