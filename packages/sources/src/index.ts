export type { IParser } from "./parser.interface.js";
export { TextParser, normalizeNewlines } from "./text-parser.js";
export { PdfParser } from "./pdf-parser.js";
export { getParser, baseMimeType } from "./parsers.js";

export type { IDocumentSource } from "./document-source.interface.js";
export { SemanticScholarSource } from "./semantic-scholar.js";
export type { SemanticScholarConfig } from "./semantic-scholar.js";
