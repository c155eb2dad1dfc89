import { Command } from "commander";
import type { CliContext } from "../context.js";
import { formatAnswer, formatReport } from "../format.js";
import { positiveInt } from "./options.js";
import type { RetrievalOptions } from "./options.js";

export function askCommand(ctx: CliContext): Command {
  return new Command("ask")
    .description("Index a topic, then answer one question about it")
    .argument("<topic>", "Search topic")
    .argument("<question>", "Question to answer")
    .option("-n, --max-documents <n>", "Number of papers to fetch", positiveInt)
    .option("-k, --top-k <k>", "Chunks to retrieve", positiveInt)
    .action(async (topic: string, question: string, options: RetrievalOptions) => {
      const assistant = ctx.assistant();
      ctx.write(formatReport(await assistant.ingest(topic, options.maxDocuments)));

      const result = await assistant.query(question, { topK: options.topK });
      ctx.write(formatAnswer(result));
    });
}
