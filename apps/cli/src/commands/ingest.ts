import { Command } from "commander";
import type { CliContext } from "../context.js";
import { formatReport } from "../format.js";
import { positiveInt } from "./options.js";
import type { RetrievalOptions } from "./options.js";

const DRY_RUN_NOTE = "Dry run: the index is not kept. Use `ask` or `chat` to query a topic.";

/** Builds a throwaway index to show what a topic yields before asking about it. */
export function ingestCommand(ctx: CliContext): Command {
  return new Command("ingest")
    .description("Dry run: fetch and chunk a topic's open-access papers and report what would be indexed")
    .argument("<topic>", "Search topic")
    .option("-n, --max-documents <n>", "Number of papers to fetch", positiveInt)
    .action(async (topic: string, options: RetrievalOptions) => {
      const report = await ctx.assistant().ingest(topic, options.maxDocuments);
      ctx.write(formatReport(report));
      ctx.write(DRY_RUN_NOTE);
    });
}
