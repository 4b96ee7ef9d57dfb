/**
 * @module @field-advisor/advisor-specialists/openai-llm
 * OpenAI chat-completions implementation of ILLM.
 */

import OpenAI from 'openai';
import type { ILLM, LLMCompleteOptions, LLMResponse } from '@field-advisor/advisor-contracts';

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

export interface ChatCompletionResult {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { total_tokens: number } | null;
}

/**
 * The slice of the OpenAI client this adapter calls.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: { model: string; messages: ChatMessage[]; temperature?: number; max_tokens?: number },
        options?: { signal?: AbortSignal },
      ): Promise<ChatCompletionResult>;
    };
  };
}

export interface OpenAIChatLLMOptions {
  /**
   * OpenAI API key (required unless `client` is given)
   */
  apiKey?: string;

  /**
   * Model to use
   * Default: 'gpt-4o-mini'
   */
  model?: string;

  /**
   * Base URL for API (optional, for OpenAI-compatible endpoints)
   */
  baseURL?: string;

  /**
   * Default: 0.7
   */
  temperature?: number;

  /**
   * Default: 800
   */
  maxTokens?: number;

  /**
   * Maximum retries for API calls
   * Default: 2
   */
  maxRetries?: number;

  /**
   * Pre-built client
   */
  client?: ChatCompletionsClient;
}

export class OpenAIChatLLM implements ILLM {
  private readonly client: ChatCompletionsClient;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenAIChatLLMOptions) {
    this.model = options.model ?? 'gpt-4o-mini';
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 800;

    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        maxRetries: options.maxRetries ?? 2,
      });
    } else {
      throw new Error('OpenAI API key is required (set OPENAI_API_KEY)');
    }
  }

  async complete(prompt: string, options: LLMCompleteOptions = {}): Promise<LLMResponse> {
    const messages: ChatMessage[] = options.systemPrompt
      ? [
          { role: 'system', content: options.systemPrompt },
          { role: 'user', content: prompt },
        ]
      : [{ role: 'user', content: prompt }];

    let response: ChatCompletionResult;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages,
          temperature: options.temperature ?? this.temperature,
          max_tokens: options.maxTokens ?? this.maxTokens,
        },
        options.signal ? { signal: options.signal } : undefined,
      );
    } catch (error) {
      throw new Error(
        `OpenAI completion failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new Error('No response from OpenAI');
    }

    const content = choice.message.content ?? '';
    return response.usage
      ? { content, tokensUsed: response.usage.total_tokens }
      : { content };
  }
}
