import type { ResearchAssistant } from "@scholarqa/core";

export type Assistant = Pick<ResearchAssistant, "ingest" | "query">;

export interface CliContext {
  /** Resolved on first use so that `--help` works without configuration. */
  assistant(): Assistant;
  write(text: string): void;
  input: NodeJS.ReadableStream;
}
