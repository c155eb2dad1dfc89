export type { IChunker } from "./chunker.interface.js";
export { ParagraphChunker, DEFAULT_CHUNKING_CONFIG } from "./paragraph-chunker.js";
export { splitParagraphs, countWords } from "./text.js";
