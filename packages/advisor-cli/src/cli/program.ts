/**
 * field-advisor command-line program.
 */

import { Command, CommanderError } from 'commander';
import { errorMessage } from '@field-advisor/advisor-contracts';
import { registerAskCommand } from './commands/ask.js';
import { registerExamplesCommand } from './commands/examples.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerLanguagesCommand } from './commands/languages.js';
import { registerSpecialistsCommand } from './commands/specialists.js';
import type { CliContext } from './context.js';

export const CLI_VERSION = '0.1.0';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

export function createProgram(ctx: CliContext, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('field-advisor')
    .description('Weather, crop and finance advice for farmers in ten Indian languages')
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.stdout(text),
      writeErr: (text) => ctx.stderr(text),
    });

  registerAskCommand(program, ctx, setExitCode);
  registerSpecialistsCommand(program, ctx);
  registerLanguagesCommand(program, ctx);
  registerExamplesCommand(program, ctx);
  registerHistoryCommand(program, ctx, setExitCode);

  return program;
}

/**
 * Run the program over `argv` (without the node and script entries) and
 * resolve to the process exit code.
 */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  let exitCode = 0;
  const program = createProgram(ctx, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    ctx.stderr(`Error: ${errorMessage(error)}\n`);
    return 1;
  }

  return exitCode;
}
