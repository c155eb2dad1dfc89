import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";

const textParser = new TextParser();
const pdfParser = new PdfParser();

const allParsers: IParser[] = [textParser, pdfParser];

/**
 * Select the parser for a MIME type. Parameters such as `; charset=utf-8` are
 * ignored; unknown types fall back to the text parser.
 */
export function getParser(mimeType: string): IParser {
  const essence = baseMimeType(mimeType);
  return allParsers.find((p) => p.supportedMimeTypes.includes(essence)) ?? textParser;
}

export function baseMimeType(mimeType: string): string {
  return (mimeType.split(";")[0] ?? "").trim().toLowerCase();
}
