export interface GenerationParams {
  /** Cap on newly generated tokens. */
  maxNewTokens: number;
  temperature: number;
  /** When false, decoding is greedy regardless of `temperature`. */
  sample: boolean;
}

export interface IGenerativeModel {
  readonly name: string;
  generate(prompt: string, params: GenerationParams, signal?: AbortSignal): Promise<string>;
  healthCheck(): Promise<boolean>;
}

export function effectiveTemperature(params: GenerationParams): number {
  return params.sample ? params.temperature : 0;
}
