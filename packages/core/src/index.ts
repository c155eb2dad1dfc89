export { ResearchAssistant, DEFAULT_ASSISTANT_OPTIONS } from "./assistant.js";
export type { ResearchAssistantDependencies, ResearchAssistantOptions } from "./assistant.js";

export { fetchPapers, buildCorpus } from "./ingestion-pipeline.js";
export type { IngestionDependencies, FetchResult } from "./ingestion-pipeline.js";

export { retrieve } from "./retriever.js";
export type { RetrievalDependencies } from "./retriever.js";

export { assembleContext, formatContext } from "./context-assembler.js";
export type { AssembleOptions } from "./context-assembler.js";

export {
  AnswerGenerator,
  extractAnswer,
  extractionText,
  DEFAULT_ANSWER_OPTIONS,
} from "./answer-generator.js";
export type { AnswerGeneratorOptions } from "./answer-generator.js";
export { buildPrompt, ANSWER_DELIMITER } from "./prompt.js";

export { createSnapshot, snapshotStats } from "./corpus.js";
export type { CorpusSnapshot } from "./corpus.js";

export { timedCall, timeoutOnly, directCall } from "./service-call.js";
export type { ServiceCall, ServiceCallOptions } from "./service-call.js";
