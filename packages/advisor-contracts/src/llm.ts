/**
 * @module @field-advisor/advisor-contracts/llm
 * Minimal LLM client contract used by the reference specialists.
 */

export interface LLMCompleteOptions {
  /** Aborted when the dispatcher abandons the call */
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
}

export interface LLMResponse {
  content: string;
  tokensUsed?: number;
}

export interface ILLM {
  complete(prompt: string, options?: LLMCompleteOptions): Promise<LLMResponse>;
}
