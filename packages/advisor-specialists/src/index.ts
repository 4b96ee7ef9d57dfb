// ============================================
// Field Advisor - Reference Specialists
// ============================================

export {
  SpecialistDefinitionSchema,
  parseSpecialistDefinitions,
  DEFAULT_SPECIALIST_DEFINITIONS,
} from './definitions.js';
export type { SpecialistDefinition } from './definitions.js';

export { keywordConfidence } from './keyword-confidence.js';
export { parseAdvice } from './response-parser.js';
export type { ParsedAdvice } from './response-parser.js';
export { buildSpecialistPrompt } from './prompt-builder.js';
export type { SpecialistPrompt } from './prompt-builder.js';

export { PromptSpecialist } from './prompt-specialist.js';
export type { PromptSpecialistOptions } from './prompt-specialist.js';

export { OpenAIChatLLM } from './openai-llm.js';
export type {
  OpenAIChatLLMOptions,
  ChatCompletionsClient,
  ChatCompletionResult,
  ChatMessage,
} from './openai-llm.js';

export { createSpecialistFactories } from './factories.js';
export type { SpecialistFactoryMap } from './factories.js';
