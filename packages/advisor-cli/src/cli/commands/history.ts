/**
 * history - Browse saved advisory runs
 *
 * Usage:
 *   field-advisor history list [--limit 20] [--json]
 *   field-advisor history show <sessionId> [--json]
 */

import { InvalidArgumentError, type Command } from 'commander';
import type { CliContext } from '../context.js';
import { formatHistory, formatHistoryIndex } from '../format.js';
import { historyStorage, loadConfig } from '../runtime.js';

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError('Limit must be a positive integer.');
  }
  return limit;
}

export function registerHistoryCommand(
  program: Command,
  ctx: CliContext,
  setExitCode: (code: number) => void,
): void {
  const history = program.command('history').description('Browse saved advisory runs');

  history
    .command('list')
    .description('List recent sessions, most recent first')
    .option('--limit <n>', 'Show at most n sessions', parseLimit)
    .option('--config <path>', 'Config file (default: advisor.yml)')
    .option('--json', 'Output as JSON')
    .action(async (flags: { limit?: number; config?: string; json?: boolean }) => {
      const index = await historyStorage(ctx, await loadConfig(ctx, flags.config)).getIndex();
      const entries = flags.limit !== undefined ? index.slice(0, flags.limit) : index;
      ctx.stdout(flags.json ? `${JSON.stringify(entries, null, 2)}\n` : formatHistoryIndex(entries));
    });

  history
    .command('show <sessionId>')
    .description('Show one saved session')
    .option('--config <path>', 'Config file (default: advisor.yml)')
    .option('--json', 'Output as JSON')
    .action(async (sessionId: string, flags: { config?: string; json?: boolean }) => {
      const saved = await historyStorage(ctx, await loadConfig(ctx, flags.config)).load(sessionId);
      if (!saved) {
        ctx.stderr(`Session not found: ${sessionId}\n`);
        setExitCode(1);
        return;
      }
      ctx.stdout(flags.json ? `${JSON.stringify(saved, null, 2)}\n` : formatHistory(saved));
    });
}
