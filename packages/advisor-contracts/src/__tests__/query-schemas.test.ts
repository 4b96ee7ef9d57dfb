import { describe, it, expect } from 'vitest';
import { createQuery, validateSpecialistPayload } from '../query-schemas.js';
import { QueryValidationError } from '../errors.js';
import { AdvisorConfigSchema, DEFAULT_ADVISOR_CONFIG } from '../config-schemas.js';

describe('createQuery', () => {
  it('applies defaults', () => {
    const query = createQuery({ text: 'Will it rain tomorrow?' });

    expect(query.text).toBe('Will it rain tomorrow?');
    expect(query.comprehensive).toBe(false);
    expect(query.context).toEqual({});
    expect(query.language).toBeUndefined();
  });

  it('trims the text', () => {
    expect(createQuery({ text: '  rice prices  ' }).text).toBe('rice prices');
  });

  it('freezes the query and its context', () => {
    const query = createQuery({ text: 'loan', context: { location: 'Pune', extra: { nested: 1 } } });

    expect(Object.isFrozen(query)).toBe(true);
    expect(Object.isFrozen(query.context)).toBe(true);
    expect(Object.isFrozen(query.context.extra)).toBe(true);
  });

  it('does not share nested context objects with the caller', () => {
    const extra = { nested: 1 };
    const query = createQuery({ text: 'loan', context: { extra } });

    expect(Object.isFrozen(extra)).toBe(false);
    expect(query.context.extra).toEqual({ nested: 1 });
  });

  it('maps snake_case context keys to camelCase', () => {
    const query = createQuery({
      text: 'loan',
      context: { crop_type: 'Rice', farmer_type: 'small', land_area: '2.5' },
    });

    expect(query.context).toEqual({ cropType: 'Rice', farmerCategory: 'small', landArea: 2.5 });
  });

  it('keeps the camelCase key when both spellings are present', () => {
    const query = createQuery({ text: 'loan', context: { cropType: 'Wheat', crop_type: 'Rice' } });

    expect(query.context.cropType).toBe('Wheat');
  });

  it('rejects empty text', () => {
    expect(() => createQuery({ text: '   ' })).toThrow(QueryValidationError);
  });

  it('rejects unsupported languages', () => {
    let caught: unknown;
    try {
      createQuery(JSON.parse('{"text":"weather","language":"fr"}'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(QueryValidationError);
    if (caught instanceof QueryValidationError) {
      expect(caught.issues[0]).toMatch(/^language: /);
    }
  });

  it('accepts a supported language override', () => {
    expect(createQuery({ text: 'weather', language: 'ta' }).language).toBe('ta');
  });
});

describe('validateSpecialistPayload', () => {
  it('accepts a minimal payload and keeps extra fields', () => {
    const result = validateSpecialistPayload({ confidence: 0.4, source: 'Weather Specialist', forecast: [] });

    expect(result.success).toBe(true);
    expect(result.data).toEqual({ confidence: 0.4, source: 'Weather Specialist', forecast: [] });
  });

  it('rejects confidence outside [0, 1]', () => {
    const result = validateSpecialistPayload({ confidence: 1.2, source: 'x' });

    expect(result.success).toBe(false);
    expect(result.issues).toEqual(['confidence: Number must be less than or equal to 1']);
  });

  it('rejects a missing source label', () => {
    const result = validateSpecialistPayload({ confidence: 0.5 });

    expect(result.success).toBe(false);
    expect(result.issues).toEqual(['source: Required']);
  });
});

describe('AdvisorConfigSchema', () => {
  it('fills every default from an empty object', () => {
    expect(DEFAULT_ADVISOR_CONFIG.dispatch.timeoutMs).toBe(5_000);
    expect(DEFAULT_ADVISOR_CONFIG.classifier).toEqual({ minScriptDensity: 0.2, inclusionThreshold: 1 });
    expect(DEFAULT_ADVISOR_CONFIG.history).toEqual({ enabled: true, dir: '.field-advisor/history' });
    expect(DEFAULT_ADVISOR_CONFIG.logging.level).toBe('info');
    expect(DEFAULT_ADVISOR_CONFIG.specialists).toEqual({});
  });

  it('defaults specialist entries to enabled', () => {
    const config = AdvisorConfigSchema.parse({ specialists: { weather: { timeoutMs: 100 } } });

    expect(config.specialists.weather).toEqual({ enabled: true, timeoutMs: 100 });
  });
});
