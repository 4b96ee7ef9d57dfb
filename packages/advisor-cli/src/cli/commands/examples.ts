/**
 * examples - Print sample questions per category
 *
 * Usage:
 *   field-advisor examples
 *   field-advisor examples --category finance --json
 */

import { InvalidArgumentError, type Command } from 'commander';
import { DOMAIN_CATEGORIES, isDomainCategory, type DomainCategory } from '@field-advisor/advisor-contracts';
import exampleQueriesJson from '../../data/example-queries.json' with { type: 'json' };
import type { CliContext } from '../context.js';

export interface ExampleQuery {
  language: string;
  text: string;
}

export const EXAMPLE_QUERIES: Readonly<Record<DomainCategory, readonly ExampleQuery[]>> = exampleQueriesJson;

function parseCategory(value: string): DomainCategory {
  if (!isDomainCategory(value)) {
    throw new InvalidArgumentError(`Expected one of: ${DOMAIN_CATEGORIES.join(', ')}.`);
  }
  return value;
}

function formatExamples(categories: readonly DomainCategory[]): string {
  return `${categories
    .map((category) =>
      [category, ...EXAMPLE_QUERIES[category].map(({ language, text }) => `  [${language}] ${text}`)].join('\n'),
    )
    .join('\n\n')}\n`;
}

export function registerExamplesCommand(program: Command, ctx: CliContext): void {
  program
    .command('examples')
    .description('Show example questions for each category')
    .option('--category <name>', 'Only this category (weather, crop, finance)', parseCategory)
    .option('--json', 'Output as JSON')
    .action((flags: { category?: DomainCategory; json?: boolean }) => {
      const categories = flags.category ? [flags.category] : DOMAIN_CATEGORIES;
      if (flags.json) {
        const body = Object.fromEntries(categories.map((category) => [category, EXAMPLE_QUERIES[category]]));
        ctx.stdout(`${JSON.stringify(body, null, 2)}\n`);
        return;
      }
      ctx.stdout(formatExamples(categories));
    });
}
