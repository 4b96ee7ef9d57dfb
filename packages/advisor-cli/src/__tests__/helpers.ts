/**
 * In-process CLI harness: captured output, mock LLM, temp working dir.
 */

import { vi, type Mock } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ILLM } from '@field-advisor/advisor-contracts';
import type { CliContext } from '../cli/context.js';
import { runCli } from '../cli/program.js';

export interface Harness {
  ctx: CliContext;
  complete: Mock<ILLM['complete']>;
  stdout: () => string;
  stderr: () => string;
  run: (...argv: string[]) => Promise<number>;
}

export function createHarness(cwd: string, answer = 'Rain likely by evening.\n- [high] Delay irrigation'): Harness {
  let out = '';
  let err = '';
  const complete = vi.fn<ILLM['complete']>(async () => ({ content: answer }));

  const ctx: CliContext = {
    cwd,
    env: {},
    stdout: (text) => {
      out += text;
    },
    stderr: (text) => {
      err += text;
    },
    createLLM: () => ({ complete }),
    logDestination: { write: () => undefined },
  };

  return {
    ctx,
    complete,
    stdout: () => out,
    stderr: () => err,
    run: (...argv) => runCli(argv, ctx),
  };
}

export async function writeConfig(cwd: string, yaml: string): Promise<void> {
  await writeFile(join(cwd, 'advisor.yml'), yaml, 'utf-8');
}
