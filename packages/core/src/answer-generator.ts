import { GenerationFailureError, TimeoutError, describeError } from "@scholarqa/errors";
import type { IGenerativeModel, ITokenizer } from "@scholarqa/generation";
import type { AnswerExtraction, TruncationSide } from "@scholarqa/types";
import { ANSWER_DELIMITER, buildPrompt } from "./prompt.js";
import type { ServiceCall } from "./service-call.js";
import { directCall } from "./service-call.js";

export interface AnswerGeneratorOptions {
  /** Prompts longer than this are truncated before generation. */
  maxInputTokens: number;
  maxNewTokens: number;
  temperature: number;
  sample: boolean;
  truncationSide: TruncationSide;
}

export const DEFAULT_ANSWER_OPTIONS: AnswerGeneratorOptions = {
  maxInputTokens: 2048,
  maxNewTokens: 512,
  temperature: 0.7,
  sample: true,
  truncationSide: "left",
};

/**
 * Take the text after the last answer delimiter. Models that echo the prompt
 * repeat the delimiter, so only the final occurrence marks the completion.
 */
export function extractAnswer(raw: string): AnswerExtraction {
  const at = raw.lastIndexOf(ANSWER_DELIMITER);
  if (at === -1) return { kind: "not_found", raw };
  return { kind: "found", answer: raw.slice(at + ANSWER_DELIMITER.length).trim() };
}

export function extractionText(extraction: AnswerExtraction): string {
  return extraction.kind === "found" ? extraction.answer : extraction.raw;
}

export class AnswerGenerator {
  private readonly options: AnswerGeneratorOptions;

  constructor(
    private readonly model: IGenerativeModel,
    private readonly tokenizer: ITokenizer,
    options: Partial<AnswerGeneratorOptions> = {},
    private readonly call: ServiceCall = directCall,
  ) {
    this.options = { ...DEFAULT_ANSWER_OPTIONS, ...options };
  }

  /** Build the prompt and fit it into the model's input window. */
  preparePrompt(question: string, context: string): string {
    const prompt = buildPrompt(question, context);
    const { maxInputTokens, truncationSide } = this.options;

    if (this.tokenizer.countTokens(prompt) <= maxInputTokens) return prompt;
    return this.tokenizer.truncate(prompt, maxInputTokens, truncationSide);
  }

  async generate(question: string, context: string): Promise<AnswerExtraction> {
    const prompt = this.preparePrompt(question, context);
    const { maxNewTokens, temperature, sample } = this.options;

    let raw: string;
    try {
      raw = await this.call(`generate (${this.model.name})`, (signal) =>
        this.model.generate(prompt, { maxNewTokens, temperature, sample }, signal),
      );
    } catch (error: unknown) {
      if (error instanceof TimeoutError || error instanceof GenerationFailureError) throw error;
      throw new GenerationFailureError(
        `Generation failed: ${describeError(error)}`,
        this.model.name,
        { cause: error },
      );
    }

    return extractAnswer(raw);
  }

  async answer(question: string, context: string): Promise<string> {
    return extractionText(await this.generate(question, context));
  }
}
