import type { AssembledContext, ContextFormat, ScoredChunk } from "@scholarqa/types";
import type { ITokenizer } from "@scholarqa/generation";

export interface AssembleOptions {
  /** Budget for chunk text. Source tags added by the format are not counted. */
  maxTokens: number;
  tokenizer: ITokenizer;
  format?: ContextFormat;
}

/**
 * Build a token-bounded, source-diverse context from ranked candidates.
 *
 * Candidates are taken in order. A chunk whose paper is already represented is
 * skipped; the first chunk that would overflow the budget ends assembly, even
 * if a later, smaller chunk would still fit.
 */
export function assembleContext(
  candidates: readonly ScoredChunk[],
  options: AssembleOptions,
): AssembledContext {
  const usedSourceIds: string[] = [];
  const selected: ScoredChunk[] = [];
  let tokenCount = 0;

  for (const candidate of candidates) {
    const sourceId = candidate.chunk.paperId;
    if (usedSourceIds.includes(sourceId)) continue;

    const tokens = options.tokenizer.countTokens(candidate.chunk.content);
    if (tokenCount + tokens > options.maxTokens) break;

    selected.push(candidate);
    usedSourceIds.push(sourceId);
    tokenCount += tokens;
  }

  return {
    context: formatContext(selected, options.format ?? "plain"),
    usedSourceIds,
    tokenCount,
    chunks: selected,
  };
}

/**
 * Render selected chunks in one of the supported layouts:
 *
 * - plain: numbered sections tagged with the source title
 * - markdown: headed sections separated by rules
 * - xml: `<document>` elements inside a `<context>` root
 */
export function formatContext(chunks: readonly ScoredChunk[], format: ContextFormat): string {
  if (chunks.length === 0) return "";

  switch (format) {
    case "xml":
      return assembleXml(chunks);
    case "markdown":
      return assembleMarkdown(chunks);
    case "plain":
    default:
      return assemblePlain(chunks);
  }
}

function assembleXml(chunks: readonly ScoredChunk[]): string {
  const parts = chunks.map(
    ({ chunk }, i) =>
      `<document index="${String(i + 1)}" source="${escapeAttribute(chunk.source.title)}">\n${chunk.content}\n</document>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(chunks: readonly ScoredChunk[]): string {
  const parts = chunks.map(
    ({ chunk }, i) => `### Source ${String(i + 1)} (${chunk.source.title})\n\n${chunk.content}`,
  );

  return `## Retrieved Context\n\n${parts.join("\n\n---\n\n")}`;
}

function assemblePlain(chunks: readonly ScoredChunk[]): string {
  const parts = chunks.map(
    ({ chunk }, i) => `[${String(i + 1)}] (Source: ${chunk.source.title})\n${chunk.content}`,
  );

  return parts.join("\n\n");
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}
