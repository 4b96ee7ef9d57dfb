// ============================================
// Field Advisor - Contracts
// ============================================

// Vocabularies
export {
  DOMAIN_CATEGORIES,
  CATEGORIES,
  SUPPORTED_LANGUAGES,
  DEFAULT_LANGUAGE,
  LANGUAGE_NAMES,
  isSupportedLanguage,
  isDomainCategory,
  DISPATCH_CONFIG,
  CLASSIFIER_CONFIG,
  HISTORY_CONFIG,
} from './constants.js';
export type { Category, DomainCategory, LanguageCode } from './constants.js';

// Data model
export type {
  Query,
  QueryContext,
  LanguageSource,
  Classification,
  Recommendation,
  RecommendationPriority,
  SpecialistPayload,
  SpecialistSuccess,
  SpecialistFailure,
  SpecialistTimeout,
  SpecialistResult,
  SpecialistOutcome,
  Specialist,
  PartialFailure,
  RankedRecommendation,
  SynthesizedData,
  SynthesizedResponse,
} from './types.js';

// Query & payload schemas
export {
  MAX_QUERY_LENGTH,
  QueryContextSchema,
  QueryInputSchema,
  RecommendationSchema,
  SpecialistPayloadSchema,
  createQuery,
  formatZodIssues,
  validateSpecialistPayload,
} from './query-schemas.js';
export type { QueryInput } from './query-schemas.js';

// Transport schemas
export {
  QueryRequestSchema,
  PartialFailureSchema,
  RankedRecommendationSchema,
  QueryResponseBodySchema,
} from './rest-schemas.js';
export type { QueryRequest, QueryResponseBody } from './rest-schemas.js';

// Configuration
export {
  AdvisorConfigSchema,
  DispatchConfigSchema,
  ClassifierConfigSchema,
  HistoryConfigSchema,
  LoggingConfigSchema,
  LLMConfigSchema,
  SpecialistSettingsSchema,
  DEFAULT_ADVISOR_CONFIG,
} from './config-schemas.js';
export type {
  AdvisorConfig,
  AdvisorConfigInput,
  ClassifierConfig,
  DispatchConfig,
  SpecialistSettings,
} from './config-schemas.js';

// Errors
export {
  AdvisorError,
  ConfigurationError,
  QueryValidationError,
  SpecialistTimeoutError,
  SpecialistPayloadError,
  errorMessage,
} from './errors.js';
export type { AdvisorErrorCode } from './errors.js';

// Collaborator interfaces
export type { ILogger, LogMeta, LogLevel } from './logger.js';
export type { ILLM, LLMCompleteOptions, LLMResponse } from './llm.js';
