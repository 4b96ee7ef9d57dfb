/**
 * Builds the system and user prompts for a specialist LLM call.
 *
 * No LLM calls; pure string assembly from the definition and the query.
 */

import { LANGUAGE_NAMES, type Query, type QueryContext } from '@field-advisor/advisor-contracts';
import type { SpecialistDefinition } from './definitions.js';

export interface SpecialistPrompt {
  system: string;
  user: string;
}

const CONTEXT_LABELS: ReadonlyArray<readonly [string, string]> = [
  ['location', 'Location'],
  ['state', 'State'],
  ['cropType', 'Crop'],
  ['season', 'Season'],
  ['farmerCategory', 'Farmer category'],
];

const ANSWER_FORMAT = [
  'Answer format:',
  '- Start with a short summary of two or three sentences.',
  '- Then list concrete actions, one per line, each starting with "- ".',
  '- Prefix an action with [high], [medium] or [low] to mark its urgency.',
].join('\n');

function describeContext(context: QueryContext): string[] {
  const lines: string[] = [];
  for (const [key, label] of CONTEXT_LABELS) {
    const value = context[key];
    if (typeof value === 'string' && value) {
      lines.push(`${label}: ${value}`);
    }
  }
  if (typeof context.landArea === 'number') {
    lines.push(`Land area: ${context.landArea}${context.landAreaUnit ? ` ${context.landAreaUnit}` : ''}`);
  }
  return lines;
}

export function buildSpecialistPrompt(
  definition: SpecialistDefinition,
  query: Query,
  context: QueryContext,
): SpecialistPrompt {
  const language = query.language
    ? `Answer in ${LANGUAGE_NAMES[query.language]}.`
    : 'Answer in the language the question is written in.';

  const system = [
    `You are an ${definition.role}. ${definition.background}`,
    `Your goal: ${definition.goal}.`,
    'Stay within your field; say so briefly when the question is outside it.',
    language,
    ANSWER_FORMAT,
  ].join('\n\n');

  const facts = describeContext(context);
  const user = facts.length > 0
    ? `Farmer details:\n${facts.join('\n')}\n\nQuestion: ${query.text}`
    : `Question: ${query.text}`;

  return { system, user };
}
