import type { TruncationSide } from "@scholarqa/types";

export interface ITokenizer {
  countTokens(text: string): number;
  /**
   * Shorten `text` to at most `maxTokens` tokens. `"left"` drops the start and
   * keeps the tail; `"right"` keeps the head.
   */
  truncate(text: string, maxTokens: number, side: TruncationSide): string;
}

const DEFAULT_CHARS_PER_TOKEN = 4;

/**
 * Character-based token estimate (~4 chars per token for English text). Cheap,
 * deterministic and never zero for non-empty text.
 */
export class EstimatingTokenizer implements ITokenizer {
  private readonly charsPerToken: number;

  constructor(charsPerToken = DEFAULT_CHARS_PER_TOKEN) {
    if (!(charsPerToken > 0)) {
      throw new RangeError("charsPerToken must be positive");
    }
    this.charsPerToken = charsPerToken;
  }

  countTokens(text: string): number {
    return Math.ceil(text.length / this.charsPerToken);
  }

  truncate(text: string, maxTokens: number, side: TruncationSide): string {
    if (this.countTokens(text) <= maxTokens) return text;

    const maxChars = Math.max(0, Math.floor(maxTokens * this.charsPerToken));
    if (maxChars === 0) return "";

    return side === "left" ? text.slice(-maxChars) : text.slice(0, maxChars);
  }
}
