#!/usr/bin/env -S npx tsx

import { ZodError } from "zod";
import { parseEnv } from "@scholarqa/config";
import type { ResearchAssistant } from "@scholarqa/core";
import { AppError, describeError } from "@scholarqa/errors";
import { createLogger } from "@scholarqa/logger";
import { createAssistant } from "./container.js";
import { buildProgram } from "./program.js";

let assistant: ResearchAssistant | undefined;

function resolveAssistant(): ResearchAssistant {
  if (!assistant) {
    const config = parseEnv();
    // stdout carries answers; logs go to stderr
    const logger = createLogger({ level: config.logLevel, destination: process.stderr });
    assistant = createAssistant(config, logger);
  }
  return assistant;
}

function reportFailure(error: unknown): void {
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `  ${issue.path.join(".")}: ${issue.message}`);
    process.stderr.write(`Invalid configuration:\n${issues.join("\n")}\n`);
  } else if (AppError.isAppError(error)) {
    const { code, message, details } = error.toJSON();
    process.stderr.write(`Error [${code}]: ${message}\n`);
    if (details) process.stderr.write(`${JSON.stringify(details, null, 2)}\n`);
  } else {
    process.stderr.write(`Error: ${describeError(error)}\n`);
  }
  process.exitCode = 1;
}

const program = buildProgram({
  assistant: resolveAssistant,
  write: (text) => {
    process.stdout.write(`${text}\n`);
  },
  input: process.stdin,
});

program.parseAsync(process.argv).catch(reportFailure);
