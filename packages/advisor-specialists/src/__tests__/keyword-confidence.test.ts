import { describe, it, expect } from 'vitest';
import { keywordConfidence } from '../keyword-confidence.js';
import { bundledDefinition } from './helpers.js';

describe('keywordConfidence', () => {
  it('returns 0.5 when there are no keywords', () => {
    expect(keywordConfidence([], 'anything at all')).toBe(0.5);
  });

  it('returns the share of keywords found, ignoring case', () => {
    expect(keywordConfidence(['rain', 'irrigation', 'humidity', 'forecast'], 'Rain FORECAST for Pune')).toBe(0.5);
  });

  it('returns 0 when nothing matches', () => {
    expect(keywordConfidence(['loan', 'bank'], 'When should I sow wheat?')).toBe(0);
  });

  it('matches Devanagari keywords', () => {
    expect(keywordConfidence(['मौसम', 'बारिश'], 'कल मौसम कैसा रहेगा')).toBe(0.5);
  });

  it('scores against the bundled weather keywords', () => {
    const { keywords } = bundledDefinition('weather');
    expect(keywords).toHaveLength(18);
    expect(keywordConfidence(keywords, 'Will it rain? Check humidity and forecast')).toBeCloseTo(3 / 18);
  });
});
