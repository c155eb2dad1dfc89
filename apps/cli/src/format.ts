import type { AnswerResult, IngestionReport } from "@scholarqa/types";

export function formatReport(report: IngestionReport): string {
  const lines = [
    `Ingested ${String(report.succeeded)}/${String(report.attempted)} papers on "${report.topic}" (${String(report.chunkCount)} chunks)`,
  ];
  for (const failure of report.failures) {
    lines.push(`  skipped ${failure.documentId} "${failure.title}": ${failure.reason}`);
  }
  return lines.join("\n");
}

export function formatAnswer(result: AnswerResult): string {
  if (result.sources.length === 0) return result.answer;

  const sources = result.sources.map((source, i) => {
    const link = source.url ?? source.publicationId;
    return `  [${String(i + 1)}] ${source.title}${link ? ` (${link})` : ""}`;
  });
  return [result.answer, "", "Sources:", ...sources].join("\n");
}
