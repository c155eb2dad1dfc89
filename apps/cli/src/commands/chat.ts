import { createInterface } from "node:readline";
import { Command } from "commander";
import { AppError, describeError } from "@scholarqa/errors";
import type { CliContext } from "../context.js";
import { formatAnswer, formatReport } from "../format.js";
import { positiveInt } from "./options.js";
import type { RetrievalOptions } from "./options.js";

const EXIT_WORDS = new Set(["exit", "quit"]);

/**
 * Interactive session over one ingested topic. Questions are read a line at a
 * time until `exit` or end of input; a failed question does not end the session.
 */
export function chatCommand(ctx: CliContext): Command {
  return new Command("chat")
    .description("Index a topic, then answer questions interactively")
    .argument("<topic>", "Search topic")
    .option("-n, --max-documents <n>", "Number of papers to fetch", positiveInt)
    .option("-k, --top-k <k>", "Chunks to retrieve", positiveInt)
    .action(async (topic: string, options: RetrievalOptions) => {
      const assistant = ctx.assistant();
      ctx.write(formatReport(await assistant.ingest(topic, options.maxDocuments)));
      ctx.write('Ask a question, or type "exit" to quit.');

      const lines = createInterface({ input: ctx.input, terminal: false });
      try {
        for await (const line of lines) {
          const question = line.trim();
          if (question.length === 0) continue;
          if (EXIT_WORDS.has(question.toLowerCase())) break;

          try {
            const result = await assistant.query(question, { topK: options.topK });
            ctx.write(formatAnswer(result));
          } catch (error: unknown) {
            if (!AppError.isAppError(error)) throw error;
            ctx.write(`Error: ${describeError(error)}`);
          }
        }
      } finally {
        lines.close();
      }
    });
}
