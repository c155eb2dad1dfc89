export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface IngestionFailure {
  documentId: string;
  title: string;
  reason: string;
}

export interface IngestionReport {
  topic: string;
  attempted: number;
  succeeded: number;
  failed: number;
  chunkCount: number;
  failures: IngestionFailure[];
}

export interface CorpusStats {
  papers: number;
  chunks: number;
  dimensions: number;
}
