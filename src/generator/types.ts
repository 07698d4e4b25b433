export interface GenerationRequest {
  systemPrompt: string;
  userPrompt: string;
  model: string;
  maxTokens: number;
  temperature: number;
  /** Aborted when the per-call timeout expires */
  signal?: AbortSignal;
}

export interface GenerationResponse {
  text: string;
  inputTokens: number;
  outputTokens: number;
  /** A populated error means the call failed and is retried like a thrown error */
  error?: string;
}

/**
 * Text generation backend. Throw `GenerationError` with `retryable: false`
 * for failures a retry cannot fix; any other failure is retried.
 */
export interface Generator {
  readonly name: string;
  generate(request: GenerationRequest): Promise<GenerationResponse>;
}
