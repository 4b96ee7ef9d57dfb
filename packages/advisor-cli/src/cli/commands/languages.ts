import type { Command } from 'commander';
import { LANGUAGE_NAMES, SUPPORTED_LANGUAGES } from '@field-advisor/advisor-contracts';
import type { CliContext } from '../context.js';

export function registerLanguagesCommand(program: Command, ctx: CliContext): void {
  program
    .command('languages')
    .description('List supported languages')
    .option('--json', 'Output as JSON')
    .action((flags: { json?: boolean }) => {
      const languages = SUPPORTED_LANGUAGES.map((code) => ({ code, name: LANGUAGE_NAMES[code] }));
      ctx.stdout(
        flags.json
          ? `${JSON.stringify(languages, null, 2)}\n`
          : `${languages.map(({ code, name }) => `${code}  ${name}`).join('\n')}\n`,
      );
    });
}
