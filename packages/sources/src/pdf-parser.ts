import { createRequire } from "node:module";
import type { ParseResult } from "@scholarqa/types";
import type pdfParseFn from "pdf-parse";
import type { IParser } from "./parser.interface.js";
import { normalizeNewlines } from "./text-parser.js";

// pdf-parse's entry point runs a debug harness when it has no parent module,
// which is the case for a plain ESM import.
const require = createRequire(import.meta.url);
const pdfParse: typeof pdfParseFn = require("pdf-parse");

/**
 * Text extraction from PDFs via pdf-parse. Pages are separated by blank lines,
 * so each page yields at least one paragraph. Scanned PDFs without a text
 * layer come back empty.
 */
export class PdfParser implements IParser {
  readonly supportedMimeTypes = ["application/pdf"] as const;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const buffer = typeof input === "string" ? Buffer.from(input, "base64") : Buffer.from(input);

    try {
      const pdf = await pdfParse(buffer);
      const text = normalizeNewlines(pdf.text);

      return {
        text,
        pageCount: pdf.numpages,
        metadata: {
          mimeType,
          charCount: text.length,
          title: typeof pdf.info?.Title === "string" ? pdf.info.Title : undefined,
        },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new Error(`Failed to parse PDF: ${message}`, { cause: error });
    }
  }
}
