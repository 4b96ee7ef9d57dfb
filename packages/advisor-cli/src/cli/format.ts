/**
 * Plain-text rendering for terminal output.
 */

import {
  LANGUAGE_NAMES,
  SpecialistPayloadSchema,
  type SpecialistPayload,
  type SynthesizedData,
  type SynthesizedResponse,
} from '@field-advisor/advisor-contracts';
import type {
  AdvisoryHistory,
  SessionMetadata,
  SpecialistDescription,
} from '@field-advisor/advisor-orchestrator';

function payloadsOf(data: SynthesizedData): SpecialistPayload[] {
  if (data === null) {
    return [];
  }
  const single = SpecialistPayloadSchema.safeParse(data);
  if (single.success) {
    return [single.data];
  }
  return Object.values(data).filter((value): value is SpecialistPayload =>
    SpecialistPayloadSchema.safeParse(value).success,
  );
}

export function formatResponse(response: SynthesizedResponse): string {
  const lines: string[] = [];

  if (!response.success) {
    lines.push('No specialist could answer this query.');
  }

  for (const payload of payloadsOf(response.data)) {
    if (payload.summary) {
      lines.push(`${payload.source}: ${payload.summary}`);
    }
  }

  if (response.recommendations.length > 0) {
    lines.push('', 'Recommendations:');
    response.recommendations.forEach((recommendation, index) => {
      const priority = recommendation.priority ? `[${recommendation.priority}] ` : '';
      lines.push(`  ${index + 1}. ${priority}${recommendation.text} (${recommendation.source})`);
    });
  }

  if (response.failures.length > 0) {
    lines.push('', 'Partial failures:');
    for (const failure of response.failures) {
      lines.push(`  - ${failure.specialistId} (${failure.category}) ${failure.outcome}: ${failure.reason}`);
    }
  }

  const sources = response.sources.length > 0 ? response.sources.join(', ') : 'none';
  lines.push('', `Confidence: ${response.confidence.toFixed(2)} | Sources: ${sources}`);

  return `${lines.join('\n').trimStart()}\n`;
}

export function formatSpecialists(specialists: readonly SpecialistDescription[]): string {
  const lines = specialists.flatMap((specialist) => [
    `${specialist.id}  ${specialist.label} (${specialist.category})`,
    `  ${specialist.description}`,
    `  capabilities: ${specialist.capabilities.join(', ')}`,
    ...(specialist.timeoutMs !== undefined ? [`  timeout: ${specialist.timeoutMs}ms`] : []),
  ]);
  return `${lines.join('\n')}\n`;
}

export function formatHistoryIndex(entries: readonly SessionMetadata[]): string {
  if (entries.length === 0) {
    return 'No history yet.\n';
  }
  const lines = entries.map((entry) =>
    [
      entry.sessionId,
      new Date(entry.timestamp).toISOString(),
      `${entry.success ? '✓' : '✗'} ${entry.primary}/${entry.language}`,
      entry.confidence.toFixed(2),
      entry.text,
    ].join('  '),
  );
  return `${lines.join('\n')}\n`;
}

export function formatHistory(history: AdvisoryHistory): string {
  const { classification } = history;
  const secondary = classification.secondary.length > 0 ? ` + ${classification.secondary.join(', ')}` : '';
  const header = [
    `Session: ${history.sessionId}`,
    `Asked: ${new Date(history.startTime).toISOString()} (${history.durationMs}ms)`,
    `Query: ${history.query.text}`,
    `Language: ${LANGUAGE_NAMES[classification.language]} (${classification.languageSource})`,
    `Category: ${classification.primary}${secondary}`,
    ...(history.error ? [`Error: ${history.error}`] : []),
    '',
  ];
  return `${header.join('\n')}\n${formatResponse(history.response)}`;
}
