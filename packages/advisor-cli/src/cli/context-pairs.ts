import { InvalidArgumentError } from 'commander';

/**
 * Commander argument parser for a repeatable `--context key=value`.
 * Later pairs overwrite earlier ones; the value may contain `=`.
 */
export function collectContextPair(
  pair: string,
  previous: Record<string, string> = {},
): Record<string, string> {
  const separator = pair.indexOf('=');
  const key = separator > 0 ? pair.slice(0, separator).trim() : '';
  if (!key) {
    throw new InvalidArgumentError('Context must be key=value.');
  }
  return { ...previous, [key]: pair.slice(separator + 1).trim() };
}
