export type ChunkStrategy = "paragraph-pairs";

/**
 * Citation data copied from the owning paper. Used only to attribute answers.
 */
export interface CitationSource {
  readonly paperId: string;
  readonly title: string;
  readonly authors: readonly string[];
  readonly url?: string;
  readonly publicationId?: string;
}

export interface Chunk {
  readonly id: string;
  readonly paperId: string;
  readonly index: number;
  readonly content: string;
  readonly wordCount: number;
  readonly paragraphs: { readonly start: number; readonly end: number };
  readonly source: CitationSource;
}

export interface ChunkingConfig {
  /** A window is kept only when its word count is strictly greater than this. */
  minWords: number;
  paragraphsPerChunk: number;
}
