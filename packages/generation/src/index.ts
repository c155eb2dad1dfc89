export type { ITokenizer } from "./tokenizer.js";
export { EstimatingTokenizer } from "./tokenizer.js";
export type { IGenerativeModel, GenerationParams } from "./model.interface.js";
export { effectiveTemperature } from "./model.interface.js";
export { OllamaGenerativeModel } from "./ollama-model.js";
export type { OllamaModelConfig } from "./ollama-model.js";
export { CohereGenerativeModel } from "./cohere-model.js";
export type { CohereModelConfig } from "./cohere-model.js";
export { createGenerativeModel } from "./factory.js";
export type { GenerativeModelFactoryConfig } from "./factory.js";
