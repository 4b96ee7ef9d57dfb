/**
 * Zod schemas for advisor.yml
 *
 * Every field has a default, so an empty (or missing) file yields a
 * working configuration.
 */

import { z } from 'zod';
import { CLASSIFIER_CONFIG, DISPATCH_CONFIG, HISTORY_CONFIG } from './constants.js';

export const DispatchConfigSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(DISPATCH_CONFIG.timeoutMs),
  })
  .default({});

export const ClassifierConfigSchema = z
  .object({
    minScriptDensity: z.number().gt(0).max(1).default(CLASSIFIER_CONFIG.minScriptDensity),
    inclusionThreshold: z.number().int().positive().default(CLASSIFIER_CONFIG.inclusionThreshold),
  })
  .default({});

export const HistoryConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    dir: z.string().min(1).default(HISTORY_CONFIG.dir),
  })
  .default({});

export const LoggingConfigSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  })
  .default({});

export const LLMConfigSchema = z
  .object({
    model: z.string().min(1).default('gpt-4o-mini'),
    temperature: z.number().min(0).max(2).default(0.7),
    maxTokens: z.number().int().positive().default(800),
    baseURL: z.string().url().optional(),
  })
  .default({});

export const SpecialistSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  timeoutMs: z.number().int().positive().optional(),
});

export const AdvisorConfigSchema = z.object({
  dispatch: DispatchConfigSchema,
  classifier: ClassifierConfigSchema,
  history: HistoryConfigSchema,
  logging: LoggingConfigSchema,
  llm: LLMConfigSchema,
  /** Keyed by specialist id */
  specialists: z.record(SpecialistSettingsSchema).default({}),
});

export type AdvisorConfig = z.output<typeof AdvisorConfigSchema>;
export type AdvisorConfigInput = z.input<typeof AdvisorConfigSchema>;
export type ClassifierConfig = z.output<typeof ClassifierConfigSchema>;
export type DispatchConfig = z.output<typeof DispatchConfigSchema>;
export type SpecialistSettings = z.output<typeof SpecialistSettingsSchema>;

export const DEFAULT_ADVISOR_CONFIG: AdvisorConfig = AdvisorConfigSchema.parse({});
