import { CohereClient } from "cohere-ai";
import type { GenerationParams, IGenerativeModel } from "./model.interface.js";
import { effectiveTemperature } from "./model.interface.js";

const DEFAULT_MODEL = "command-r-08-2024";

export interface CohereModelConfig {
  apiKey: string;
  model?: string;
}

/**
 * Hosted generation through Cohere's v2 chat endpoint. The whole grounded prompt
 * is sent as a single user turn.
 */
export class CohereGenerativeModel implements IGenerativeModel {
  readonly name: string;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereModelConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.name = `cohere:${this.model}`;
  }

  async generate(prompt: string, params: GenerationParams, signal?: AbortSignal): Promise<string> {
    const response = await this.client.v2.chat(
      {
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        maxTokens: params.maxNewTokens,
        temperature: effectiveTemperature(params),
      },
      { abortSignal: signal },
    );

    const parts: string[] = [];
    for (const item of response.message.content ?? []) {
      if (item.type === "text") parts.push(item.text);
    }
    return parts.join("");
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.v2.chat({
        model: this.model,
        messages: [{ role: "user", content: "ping" }],
        maxTokens: 1,
      });
      return true;
    } catch {
      return false;
    }
  }
}
