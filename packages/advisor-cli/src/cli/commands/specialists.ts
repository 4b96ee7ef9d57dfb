/**
 * specialists - List the specialists advisor.yml enables
 */

import type { Command } from 'commander';
import type { CliContext } from '../context.js';
import { formatSpecialists } from '../format.js';
import { buildRegistry, loadConfig } from '../runtime.js';

export function registerSpecialistsCommand(program: Command, ctx: CliContext): void {
  program
    .command('specialists')
    .description('List enabled specialists and their capabilities')
    .option('--config <path>', 'Config file (default: advisor.yml)')
    .option('--json', 'Output as JSON')
    .action(async (flags: { config?: string; json?: boolean }) => {
      const specialists = buildRegistry(await loadConfig(ctx, flags.config)).describe();
      ctx.stdout(flags.json ? `${JSON.stringify(specialists, null, 2)}\n` : formatSpecialists(specialists));
    });
}
