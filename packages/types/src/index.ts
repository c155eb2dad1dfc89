export type {
  DocumentRef,
  PaperMetadata,
  PaperDetails,
  Paper,
  DownloadedArtifact,
  ParseResult,
} from "./document.js";
export type { ChunkStrategy, CitationSource, Chunk, ChunkingConfig } from "./chunk.js";
export type {
  EmbeddingResult,
  IngestionFailure,
  IngestionReport,
  CorpusStats,
} from "./pipeline.js";
export type {
  ContextFormat,
  TruncationSide,
  IndexHit,
  ScoredChunk,
  AssembledContext,
  AnswerExtraction,
  AnswerResult,
  QueryOptions,
} from "./query.js";
export type {
  AppConfig,
  EmbeddingProviderType,
  GenerationProviderType,
  SourceConfig,
  EmbeddingsConfig,
  GenerationConfig,
  RetrievalConfig,
  ServiceCallConfig,
} from "./config.js";
