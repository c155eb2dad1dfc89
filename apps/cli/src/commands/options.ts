import { InvalidArgumentError } from "commander";

export function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

export interface RetrievalOptions {
  maxDocuments?: number;
  topK?: number;
}
