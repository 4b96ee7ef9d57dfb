/**
 * advisor.yml loading.
 *
 * The file is optional; every field has a default. Environment variables
 * override the file: FIELD_ADVISOR_LOG_LEVEL, FIELD_ADVISOR_TIMEOUT_MS.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseYAML } from 'yaml';
import {
  AdvisorConfigSchema,
  ConfigurationError,
  errorMessage,
  formatZodIssues,
  type AdvisorConfig,
} from '@field-advisor/advisor-contracts';

export const DEFAULT_CONFIG_FILE = 'advisor.yml';

export interface LoadConfigOptions {
  /** Explicit path; a missing explicit file is an error */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function validate(raw: unknown, origin: string): AdvisorConfig {
  const result = AdvisorConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigurationError(`Invalid configuration in ${origin}:\n  • ${issues.join('\n  • ')}`, {
      issues,
    });
  }
  return result.data;
}

async function readConfigFile(path: string, required: boolean): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigurationError(`Cannot read config file ${path}: ${errorMessage(error)}`);
  }

  try {
    return parseYAML(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file ${path}: ${errorMessage(error)}`);
  }
}

/**
 * Apply environment overrides on top of a validated config.
 */
export function applyEnvOverrides(config: AdvisorConfig, env: NodeJS.ProcessEnv): AdvisorConfig {
  const level = env.FIELD_ADVISOR_LOG_LEVEL;
  const timeout = env.FIELD_ADVISOR_TIMEOUT_MS;
  if (!level && !timeout) {
    return config;
  }

  return validate(
    {
      ...config,
      logging: { ...config.logging, ...(level ? { level } : {}) },
      dispatch: { ...config.dispatch, ...(timeout ? { timeoutMs: Number(timeout) } : {}) },
    },
    'environment',
  );
}

/**
 * Load and validate advisor.yml.
 *
 * @throws ConfigurationError on unreadable, unparsable or invalid config
 */
export async function loadAdvisorConfig(options: LoadConfigOptions = {}): Promise<AdvisorConfig> {
  const cwd = options.cwd ?? process.cwd();
  const path = resolve(cwd, options.path ?? DEFAULT_CONFIG_FILE);

  const raw = await readConfigFile(path, options.path !== undefined);
  const config = validate(raw, path);

  return applyEnvOverrides(config, options.env ?? process.env);
}
