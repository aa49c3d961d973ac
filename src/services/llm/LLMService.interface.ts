import type { LLMProvider } from '../../config/index.js';

export interface GenerationRequest {
  prompt: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface GenerationResult {
  /** Completions in provider order; may be empty. */
  replies: string[];
  model: string;
  tokensUsed?: number;
}

export interface LLMService {
  readonly provider: LLMProvider;
  readonly model: string;

  generate(request: GenerationRequest): Promise<GenerationResult>;
  /** Yields text deltas as the provider produces them. */
  stream(request: GenerationRequest): AsyncIterable<string>;
}
