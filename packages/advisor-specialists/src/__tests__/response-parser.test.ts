import { describe, it, expect } from 'vitest';
import { parseAdvice } from '../response-parser.js';

describe('parseAdvice', () => {
  it('splits summary lines from list items and reads priority tags', () => {
    const advice = parseAdvice(
      'Dry week ahead.\nExpect 38°C by Friday.\n\n- [high] Irrigate within 24 hours\n* Mulch the beds\n2. [LOW] Check the pump',
    );

    expect(advice.summary).toBe('Dry week ahead. Expect 38°C by Friday.');
    expect(advice.recommendations).toEqual([
      { text: 'Irrigate within 24 hours', priority: 'high' },
      { text: 'Mulch the beds' },
      { text: 'Check the pump', priority: 'low' },
    ]);
  });

  it('skips list items that are empty after the tag', () => {
    expect(parseAdvice('- [medium]\n- Sow after the first rain').recommendations).toEqual([
      { text: 'Sow after the first rain' },
    ]);
  });

  it('keeps bold markup at line start in the summary', () => {
    expect(parseAdvice('**Good news** for wheat growers')).toEqual({
      summary: '**Good news** for wheat growers',
      recommendations: [],
    });
  });

  it('handles CRLF line endings', () => {
    expect(parseAdvice('Plan ahead.\r\n1) [medium] Book a soil test')).toEqual({
      summary: 'Plan ahead.',
      recommendations: [{ text: 'Book a soil test', priority: 'medium' }],
    });
  });
});
