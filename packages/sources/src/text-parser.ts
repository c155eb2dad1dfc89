import type { ParseResult } from "@scholarqa/types";
import type { IParser } from "./parser.interface.js";

const TEXT_MIME_TYPES = ["text/plain", "text/markdown", "text/html"] as const;

const CHARS_PER_PAGE = 3000;

/**
 * Plain text, markdown and HTML. Blank lines are preserved so paragraph
 * boundaries survive; HTML block elements become paragraph breaks.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const text = typeof input === "string" ? input : new TextDecoder().decode(input);

    const cleanedText = normalizeNewlines(mimeType === "text/html" ? stripHtml(text) : text);

    // roughly 3000 chars per page
    const pageCount = Math.max(1, Math.ceil(cleanedText.length / CHARS_PER_PAGE));

    return {
      text: cleanedText,
      pageCount,
      metadata: {
        mimeType,
        charCount: cleanedText.length,
        wordCount: cleanedText.split(/\s+/).filter((w) => w.length > 0).length,
      },
    };
  }
}

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/\n{3,}/g, "\n\n").trim();
}

function stripHtml(html: string): string {
  return html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
    .replace(/<\/(p|div|h[1-6]|li|section|article)>/gi, "\n\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/[ \t]+/g, " ")
    .replace(/ *\n */g, "\n")
    .trim();
}
