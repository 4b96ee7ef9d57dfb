/**
 * @module @field-advisor/advisor-specialists/prompt-specialist
 * Specialist that answers through an injected LLM client.
 */

import type {
  DomainCategory,
  ILLM,
  Query,
  QueryContext,
  Specialist,
  SpecialistPayload,
} from '@field-advisor/advisor-contracts';
import type { SpecialistDefinition } from './definitions.js';
import { keywordConfidence } from './keyword-confidence.js';
import { buildSpecialistPrompt } from './prompt-builder.js';
import { parseAdvice } from './response-parser.js';

export interface PromptSpecialistOptions {
  /** Overrides the dispatcher's default budget */
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Reference specialist.
 *
 * The LLM writes the advice; confidence is the keyword share of the
 * question, never the model's own claim.
 *
 * @example
 * ```typescript
 * const weather = new PromptSpecialist(definition, llm, { timeoutMs: 8000 });
 * const payload = await weather.invoke(query, classification.context, signal);
 * ```
 */
export class PromptSpecialist implements Specialist {
  readonly id: string;
  readonly category: DomainCategory;
  readonly label: string;
  readonly description: string;
  readonly capabilities: readonly string[];
  readonly timeoutMs?: number;

  constructor(
    private readonly definition: SpecialistDefinition,
    private readonly llm: ILLM,
    private readonly options: PromptSpecialistOptions = {},
  ) {
    this.id = definition.id;
    this.category = definition.category;
    this.label = definition.label;
    this.description = definition.description;
    this.capabilities = Object.freeze([...definition.capabilities]);
    if (options.timeoutMs !== undefined) {
      this.timeoutMs = options.timeoutMs;
    }
  }

  async invoke(query: Query, context: QueryContext, signal: AbortSignal): Promise<SpecialistPayload> {
    signal.throwIfAborted();

    const prompt = buildSpecialistPrompt(this.definition, query, context);
    const response = await this.llm.complete(prompt.user, {
      signal,
      systemPrompt: prompt.system,
      ...(this.options.temperature !== undefined ? { temperature: this.options.temperature } : {}),
      ...(this.options.maxTokens !== undefined ? { maxTokens: this.options.maxTokens } : {}),
    });

    const advice = response.content.trim();
    if (!advice) {
      throw new Error(`Specialist '${this.id}' received an empty answer`);
    }

    const { summary, recommendations } = parseAdvice(advice);
    return {
      confidence: keywordConfidence(this.definition.keywords, query.text),
      source: this.label,
      summary: summary || advice,
      recommendations,
      advice,
      ...(response.tokensUsed !== undefined ? { tokensUsed: response.tokensUsed } : {}),
    };
  }
}
