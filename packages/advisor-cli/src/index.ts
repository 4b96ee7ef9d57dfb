export { createProgram, runCli, CLI_VERSION } from './cli/program.js';
export { createOpenAILLM, createProcessContext } from './cli/context.js';
export type { CliContext } from './cli/context.js';
export { collectContextPair } from './cli/context-pairs.js';
export { formatResponse, formatSpecialists, formatHistory, formatHistoryIndex } from './cli/format.js';
export { INVALID_QUERY_EXIT_CODE } from './cli/commands/ask.js';
