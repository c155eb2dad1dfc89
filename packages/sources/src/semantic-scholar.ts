import { ExternalServiceError, ValidationError, createCircuitBreaker } from "@scholarqa/errors";
import type { CircuitState } from "@scholarqa/errors";
import type { DocumentRef, DownloadedArtifact, PaperDetails } from "@scholarqa/types";
import type { IDocumentSource } from "./document-source.interface.js";
import { baseMimeType } from "./parsers.js";

const DEFAULT_BASE_URL = "https://api.semanticscholar.org/graph/v1";
const DEFAULT_TIMEOUT_MS = 30_000;
/** Graph API upper bound for `limit` on relevance search. */
const MAX_SEARCH_LIMIT = 100;
/** Graph API upper bound for ids per batch request. */
const MAX_BATCH_IDS = 500;

const SEARCH_FIELDS = "paperId,title,isOpenAccess,openAccessPdf";
const DETAIL_FIELDS = "paperId,title,authors,externalIds,url,year,venue,openAccessPdf";

export interface SemanticScholarConfig {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  onCircuitStateChange?: (name: string, state: CircuitState) => void;
}

interface OpenAccessPdf {
  url?: string | null;
}

interface SearchHit {
  paperId: string;
  title: string | null;
  isOpenAccess?: boolean;
  openAccessPdf?: OpenAccessPdf | null;
}

interface SearchResponse {
  total?: number;
  data?: unknown[];
}

interface BatchPaper extends SearchHit {
  authors?: { name: string | null }[];
  externalIds?: Record<string, string | number | null> | null;
  url?: string | null;
  year?: number | null;
  venue?: string | null;
}

interface HttpRequest {
  url: string;
  init: RequestInit;
}

/**
 * Semantic Scholar Graph API client. JSON calls and full-text downloads go
 * through separate circuit breakers so a run of broken PDF links does not
 * short-circuit the API itself.
 */
export class SemanticScholarSource implements IDocumentSource {
  readonly name = "semantic-scholar";
  private baseUrl: string;
  private apiKey: string | undefined;
  private api;
  private downloads;

  constructor(config: SemanticScholarConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
    this.apiKey = config.apiKey;
    const timeout = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const onStateChange = config.onCircuitStateChange;

    this.api = createCircuitBreaker(
      this.name,
      (request: HttpRequest) => this.requestJson(request),
      { timeout, onStateChange },
    );
    this.downloads = createCircuitBreaker(
      `${this.name}-downloads`,
      (url: string, signal?: AbortSignal) => this.fetchArtifact(url, signal),
      { timeout, errorThresholdPercentage: 90, onStateChange },
    );
  }

  async search(query: string, limit: number): Promise<DocumentRef[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError("Invalid search limit", { limit: "must be a positive integer" });
    }

    const params = new URLSearchParams({
      query,
      limit: String(Math.min(limit, MAX_SEARCH_LIMIT)),
      fields: SEARCH_FIELDS,
    });
    const body = await this.api.fire({
      url: `${this.baseUrl}/paper/search?${params.toString()}`,
      init: { method: "GET", headers: this.headers() },
    });

    if (!isSearchResponse(body)) {
      throw new ExternalServiceError("Unexpected paper search response", this.name);
    }

    return (body.data ?? [])
      .filter(hasPaperId)
      .slice(0, limit)
      .map((hit) => ({
        id: hit.paperId,
        title: hit.title ?? "Untitled",
        hasFullText: Boolean(hit.openAccessPdf?.url),
      }));
  }

  async fetchDetails(ids: readonly string[]): Promise<PaperDetails[]> {
    if (ids.length === 0) return [];

    const details: PaperDetails[] = [];
    for (let i = 0; i < ids.length; i += MAX_BATCH_IDS) {
      const batch = ids.slice(i, i + MAX_BATCH_IDS);
      const params = new URLSearchParams({ fields: DETAIL_FIELDS });
      const body = await this.api.fire({
        url: `${this.baseUrl}/paper/batch?${params.toString()}`,
        init: {
          method: "POST",
          headers: { ...this.headers(), "Content-Type": "application/json" },
          body: JSON.stringify({ ids: batch }),
        },
      });

      if (!Array.isArray(body)) {
        throw new ExternalServiceError("Unexpected paper batch response", this.name);
      }
      for (const entry of body) {
        // the batch endpoint answers null for ids it does not know
        if (hasPaperId(entry)) details.push(toPaperDetails(entry));
      }
    }
    return details;
  }

  async download(url: string, signal?: AbortSignal): Promise<DownloadedArtifact> {
    return this.downloads.fire(url, signal);
  }

  private headers(): Record<string, string> {
    return this.apiKey ? { "x-api-key": this.apiKey } : {};
  }

  private async requestJson({ url, init }: HttpRequest): Promise<unknown> {
    const response = await fetch(url, init);
    if (!response.ok) {
      throw new ExternalServiceError(
        `Semantic Scholar request failed: ${String(response.status)} ${response.statusText}`,
        this.name,
        { details: { status: response.status } },
      );
    }
    return response.json();
  }

  private async fetchArtifact(url: string, signal?: AbortSignal): Promise<DownloadedArtifact> {
    const response = await fetch(url, { redirect: "follow", signal });
    if (!response.ok) {
      throw new ExternalServiceError(
        `Download failed: ${String(response.status)} ${response.statusText}`,
        this.name,
        { details: { status: response.status, url } },
      );
    }

    const contentType = response.headers.get("content-type");
    return {
      data: new Uint8Array(await response.arrayBuffer()),
      mimeType: contentType ? baseMimeType(contentType) : guessMimeType(url),
    };
  }
}

function guessMimeType(url: string): string {
  return new URL(url).pathname.toLowerCase().endsWith(".pdf") ? "application/pdf" : "text/plain";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isSearchResponse(value: unknown): value is SearchResponse {
  return isRecord(value) && (value.data === undefined || Array.isArray(value.data));
}

function hasPaperId(value: unknown): value is BatchPaper {
  return isRecord(value) && typeof value.paperId === "string";
}

function toPaperDetails(paper: BatchPaper): PaperDetails {
  const pdfUrl = paper.openAccessPdf?.url ?? undefined;
  return {
    id: paper.paperId,
    title: paper.title ?? "Untitled",
    hasFullText: Boolean(pdfUrl),
    pdfUrl,
    metadata: {
      authors: (paper.authors ?? []).flatMap((a) => (a.name ? [a.name] : [])),
      publicationId: publicationId(paper.externalIds),
      url: paper.url ?? undefined,
      year: paper.year ?? undefined,
      venue: paper.venue || undefined,
    },
  };
}

function publicationId(externalIds: BatchPaper["externalIds"]): string | undefined {
  if (!externalIds) return undefined;
  for (const key of ["DOI", "ArXiv", "PubMed", "CorpusId"]) {
    const value = externalIds[key];
    if (value !== null && value !== undefined) return `${key}:${String(value)}`;
  }
  return undefined;
}
