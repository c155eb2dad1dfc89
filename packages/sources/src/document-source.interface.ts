import type { DocumentRef, DownloadedArtifact, PaperDetails } from "@scholarqa/types";

/**
 * A searchable catalogue of papers with downloadable full text.
 */
export interface IDocumentSource {
  readonly name: string;
  search(query: string, limit: number): Promise<DocumentRef[]>;
  /** Resolve metadata for the given ids. Unknown ids are omitted from the result. */
  fetchDetails(ids: readonly string[]): Promise<PaperDetails[]>;
  download(url: string, signal?: AbortSignal): Promise<DownloadedArtifact>;
}
