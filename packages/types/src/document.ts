/**
 * A search hit returned by a document source. Immutable once fetched.
 */
export interface DocumentRef {
  readonly id: string;
  readonly title: string;
  readonly hasFullText?: boolean;
}

export interface PaperMetadata {
  authors: string[];
  publicationId?: string;
  url?: string;
  year?: number;
  venue?: string;
}

/**
 * Per-document details resolved after search, before the full text is fetched.
 */
export interface PaperDetails extends DocumentRef {
  readonly metadata: PaperMetadata;
  readonly pdfUrl?: string;
}

export interface Paper extends DocumentRef {
  readonly text: string;
  readonly metadata: Readonly<PaperMetadata>;
}

export interface DownloadedArtifact {
  data: Uint8Array;
  mimeType: string;
}

export interface ParseResult {
  text: string;
  pageCount: number;
  metadata: Record<string, unknown>;
}
