import { ValidationError } from "@scholarqa/errors";
import type { Chunk, ChunkingConfig, CitationSource, Paper } from "@scholarqa/types";
import type { IChunker } from "./chunker.interface.js";
import { countWords, splitParagraphs } from "./text.js";

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  minWords: 30,
  paragraphsPerChunk: 2,
};

/**
 * Groups consecutive paragraphs into fixed windows.
 *
 * Windows advance by their own size, so they never overlap: with two paragraphs
 * per chunk a five-paragraph paper yields the windows [0,1], [2,3], [4]. A window
 * becomes a chunk only when it holds strictly more than `minWords` words. Papers
 * with fewer than two paragraphs produce no chunks.
 */
export class ParagraphChunker implements IChunker {
  readonly strategy = "paragraph-pairs";
  private readonly config: ChunkingConfig;

  constructor(config: Partial<ChunkingConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };

    const fields: Record<string, string> = {};
    if (!Number.isInteger(this.config.minWords) || this.config.minWords < 0) {
      fields["minWords"] = "must be a non-negative integer";
    }
    if (!Number.isInteger(this.config.paragraphsPerChunk) || this.config.paragraphsPerChunk < 1) {
      fields["paragraphsPerChunk"] = "must be a positive integer";
    }
    if (Object.keys(fields).length > 0) {
      throw new ValidationError("Invalid chunking config", fields);
    }
  }

  chunk(paper: Paper): Chunk[] {
    const { minWords, paragraphsPerChunk } = this.config;
    const paragraphs = splitParagraphs(paper.text);

    if (paragraphs.length < 2) return [];

    const source = citationOf(paper);
    const results: Chunk[] = [];

    for (let start = 0; start < paragraphs.length; start += paragraphsPerChunk) {
      const window = paragraphs.slice(start, start + paragraphsPerChunk);
      const content = window.join("\n\n");
      const wordCount = countWords(content);

      if (wordCount <= minWords) continue;

      const index = results.length;
      results.push({
        id: `${paper.id}#${String(index)}`,
        paperId: paper.id,
        index,
        content,
        wordCount,
        paragraphs: { start, end: start + window.length - 1 },
        source,
      });
    }

    return results;
  }
}

function citationOf(paper: Paper): CitationSource {
  return Object.freeze({
    paperId: paper.id,
    title: paper.title,
    authors: Object.freeze([...paper.metadata.authors]),
    url: paper.metadata.url,
    publicationId: paper.metadata.publicationId,
  });
}
