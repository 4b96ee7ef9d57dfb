/**
 * ask - Answer a farming question
 *
 * Usage:
 *   field-advisor ask Will it rain in Pune tomorrow?
 *   field-advisor ask --comprehensive --context landArea=2 Loan and seeds for cotton
 *   field-advisor ask --language hi --json कल बारिश होगी?
 *   field-advisor ask --specialist finance How do I apply for PM-KISAN?
 */

import type { Command } from 'commander';
import type { AdvisorConfig, DomainCategory } from '@field-advisor/advisor-contracts';
import { parseQueryRequest, toTransportResponse } from '@field-advisor/advisor-orchestrator';
import type { CliContext } from '../context.js';
import { collectContextPair } from '../context-pairs.js';
import { formatResponse } from '../format.js';
import { buildRegistry, createOrchestrator, loadConfig } from '../runtime.js';

interface AskFlags {
  comprehensive?: boolean;
  language?: string;
  context?: Record<string, string>;
  specialist?: string;
  config?: string;
  json?: boolean;
}

/** Exit code for a request the transport contract rejects */
export const INVALID_QUERY_EXIT_CODE = 2;

function specialistCategory(config: AdvisorConfig, id: string): DomainCategory {
  const specialist = buildRegistry(config).get(id);
  if (!specialist) {
    throw new Error(`Unknown specialist '${id}'`);
  }
  return specialist.category;
}

export function registerAskCommand(
  program: Command,
  ctx: CliContext,
  setExitCode: (code: number) => void,
): void {
  program
    .command('ask <query...>')
    .description('Ask a weather, crop or finance question')
    .option('-c, --comprehensive', 'Consult every specialist the question touches')
    .option('-l, --language <code>', 'Answer language (default: detected from the question)')
    .option('--context <key=value>', 'Known context, repeatable (location, cropType, landArea, ...)', collectContextPair)
    .option('-s, --specialist <id>', 'Ask one specialist directly (see `specialists`)')
    .option('--config <path>', 'Config file (default: advisor.yml)')
    .option('--json', 'Print the response as JSON')
    .action(async (words: string[], flags: AskFlags) => {
      const config = await loadConfig(ctx, flags.config);
      const category = flags.specialist === undefined ? undefined : specialistCategory(config, flags.specialist);

      const request = parseQueryRequest({
        query: words.join(' '),
        comprehensive: category === undefined && (flags.comprehensive ?? false),
        ...(flags.context ? { context: flags.context } : {}),
        ...(flags.language ? { language: flags.language } : {}),
      });
      if (!request.ok) {
        ctx.stderr(`Invalid query:\n${request.errors.map((error) => `  • ${error}`).join('\n')}\n`);
        setExitCode(INVALID_QUERY_EXIT_CODE);
        return;
      }

      const orchestrator = createOrchestrator(ctx, config);
      const response = await orchestrator.handle(request.query, {
        ...(ctx.signal ? { signal: ctx.signal } : {}),
        ...(category ? { category } : {}),
      });

      ctx.stdout(flags.json ? `${JSON.stringify(toTransportResponse(response), null, 2)}\n` : formatResponse(response));
      setExitCode(response.success ? 0 : 1);
    });
}
