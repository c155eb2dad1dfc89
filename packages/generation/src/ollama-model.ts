import { ExternalServiceError } from "@scholarqa/errors";
import type { GenerationParams, IGenerativeModel } from "./model.interface.js";
import { effectiveTemperature } from "./model.interface.js";

const DEFAULT_BASE_URL = "http://localhost:11434";
const DEFAULT_MODEL = "llama3.1";

export interface OllamaModelConfig {
  baseUrl?: string;
  model?: string;
  /**
   * Return the prompt followed by the completion, the way full-text generation
   * pipelines do. The answer is then recovered after the answer delimiter.
   */
  echoPrompt?: boolean;
}

interface OllamaGenerateResponse {
  response: string;
  done: boolean;
}

interface OllamaErrorBody {
  error?: string;
}

/**
 * Local inference through Ollama's `POST /api/generate`, non-streaming.
 */
export class OllamaGenerativeModel implements IGenerativeModel {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly echoPrompt: boolean;

  constructor(config: OllamaModelConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.echoPrompt = config.echoPrompt ?? false;
    this.name = `ollama:${this.model}`;
  }

  async generate(prompt: string, params: GenerationParams, signal?: AbortSignal): Promise<string> {
    const response = await fetch(`${this.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        prompt,
        stream: false,
        options: {
          temperature: effectiveTemperature(params),
          num_predict: params.maxNewTokens,
        },
      }),
      signal,
    });

    if (!response.ok) {
      throw new ExternalServiceError(await this.describeFailure(response), this.name, {
        details: { status: response.status },
      });
    }

    const data = (await response.json()) as OllamaGenerateResponse;
    return this.echoPrompt ? prompt + data.response : data.response;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch {
      return false;
    }
  }

  private async describeFailure(response: Response): Promise<string> {
    if (response.status === 404) {
      return `Model "${this.model}" not found. Pull it with: ollama pull ${this.model}`;
    }
    const detail =
      parseErrorBody(await response.text()) ??
      `${String(response.status)} ${response.statusText}`;
    return `Ollama generation failed: ${detail}`;
  }
}

function parseErrorBody(body: string): string | undefined {
  try {
    const parsed = JSON.parse(body) as OllamaErrorBody;
    return parsed.error;
  } catch {
    return undefined;
  }
}
