/**
 * What the commands need from the outside world. `bin.ts` wires the real
 * process; tests pass their own.
 */

import type { AdvisorConfig, ILLM } from '@field-advisor/advisor-contracts';
import type { CreateLoggerOptions } from '@field-advisor/advisor-orchestrator';
import { OpenAIChatLLM } from '@field-advisor/advisor-specialists';

export interface CliContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout(text: string): void;
  stderr(text: string): void;
  /** Builds the LLM client behind the specialists */
  createLLM(config: AdvisorConfig, env: NodeJS.ProcessEnv): ILLM;
  /** Where pino writes; defaults to stderr so stdout stays parseable */
  logDestination?: CreateLoggerOptions['destination'];
  /** Aborts an in-flight `ask` */
  signal?: AbortSignal;
}

export function createOpenAILLM(config: AdvisorConfig, env: NodeJS.ProcessEnv): ILLM {
  return new OpenAIChatLLM({
    apiKey: env.OPENAI_API_KEY,
    model: config.llm.model,
    baseURL: config.llm.baseURL,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
  });
}

export function createProcessContext(signal?: AbortSignal): CliContext {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    createLLM: createOpenAILLM,
    logDestination: process.stderr,
    ...(signal ? { signal } : {}),
  };
}
