import type { GenerationProviderType } from "@scholarqa/types";
import type { IGenerativeModel } from "./model.interface.js";
import { OllamaGenerativeModel } from "./ollama-model.js";
import type { OllamaModelConfig } from "./ollama-model.js";
import { CohereGenerativeModel } from "./cohere-model.js";
import type { CohereModelConfig } from "./cohere-model.js";

export interface GenerativeModelFactoryConfig {
  provider: GenerationProviderType;
  ollama?: OllamaModelConfig;
  cohere?: CohereModelConfig;
}

export function createGenerativeModel(config: GenerativeModelFactoryConfig): IGenerativeModel {
  switch (config.provider) {
    case "ollama":
      return new OllamaGenerativeModel(config.ollama);
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereGenerativeModel(config.cohere);
    default:
      throw new Error(`Unknown generation provider: ${String(config.provider)}`);
  }
}
