import { Command } from "commander";
import type { CliContext } from "./context.js";
import { askCommand } from "./commands/ask.js";
import { chatCommand } from "./commands/chat.js";
import { ingestCommand } from "./commands/ingest.js";

export function buildProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name("scholarqa")
    .description("Answer research questions from open-access papers")
    .version("0.1.0");
  program.addCommand(ingestCommand(ctx));
  program.addCommand(askCommand(ctx));
  program.addCommand(chatCommand(ctx));

  return program;
}
