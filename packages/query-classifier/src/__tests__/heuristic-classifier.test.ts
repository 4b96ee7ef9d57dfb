/**
 * Tests for HeuristicQueryClassifier
 */

import { describe, it, expect } from 'vitest';
import { createQuery } from '@field-advisor/advisor-contracts';
import { HeuristicQueryClassifier } from '../heuristic-classifier.js';

describe('HeuristicQueryClassifier', () => {
  const classifier = new HeuristicQueryClassifier();

  describe('English keywords', () => {
    it('should classify rain questions as weather', () => {
      const result = classifier.classify(createQuery({ text: 'Will it rain in Pune tomorrow?' }));

      expect(result.primary).toBe('weather');
      expect(result.language).toBe('en');
      expect(result.languageSource).toBe('default');
      expect(result.scores).toEqual({ weather: 1, crop: 0, finance: 0 });
    });

    it('should classify fertilizer questions as crop', () => {
      const result = classifier.classify(
        createQuery({ text: 'Which fertilizer should I use for my wheat crop?' }),
      );

      expect(result.primary).toBe('crop');
      expect(result.scores.crop).toBe(2);
    });

    it('should classify loan questions as finance', () => {
      const result = classifier.classify(createQuery({ text: 'How do I get a loan for my farm?' }));

      expect(result.primary).toBe('finance');
    });

    it('should not match keywords inside other words', () => {
      const result = classifier.classify(createQuery({ text: 'The train was late' }));

      expect(result.scores.weather).toBe(0);
      expect(result.primary).toBe('general');
    });
  });

  describe('Category selection', () => {
    it('should fall back to general when nothing matches', () => {
      const result = classifier.classify(createQuery({ text: 'Hello, how are you?' }));

      expect(result.primary).toBe('general');
      expect(result.secondary).toEqual([]);
    });

    it('should break ties in weather, crop, finance order', () => {
      expect(classifier.classify(createQuery({ text: 'rain and loan' })).primary).toBe('weather');
      expect(classifier.classify(createQuery({ text: 'seed and loan' })).primary).toBe('crop');
    });

    it('should only add secondaries to comprehensive queries', () => {
      const text = 'Rain forecast and a loan for seed';

      const plain = classifier.classify(createQuery({ text }));
      const comprehensive = classifier.classify(createQuery({ text, comprehensive: true }));

      expect(plain.primary).toBe('weather');
      expect(plain.secondary).toEqual([]);
      expect(comprehensive.primary).toBe('weather');
      expect(comprehensive.secondary).toEqual(['crop', 'finance']);
    });

    it('should order secondaries by score before priority', () => {
      const result = classifier.classify(
        createQuery({
          text: 'Loan, credit and subsidy for seed and fertilizer before the rain',
          comprehensive: true,
        }),
      );

      expect(result.scores).toEqual({ weather: 1, crop: 2, finance: 3 });
      expect(result.primary).toBe('finance');
      expect(result.secondary).toEqual(['crop', 'weather']);
    });

    it('should respect a higher inclusion threshold', () => {
      const strict = new HeuristicQueryClassifier({ inclusionThreshold: 2 });
      const result = strict.classify(
        createQuery({ text: 'Rain forecast and a loan for seed', comprehensive: true }),
      );

      expect(result.secondary).toEqual([]);
    });
  });

  describe('Languages', () => {
    it('should detect Hindi and use Hindi keywords', () => {
      const result = classifier.classify(createQuery({ text: 'मेरे गेहूं में कीट लगे हैं' }));

      expect(result.language).toBe('hi');
      expect(result.languageSource).toBe('detected');
      expect(result.primary).toBe('crop');
      expect(result.context.cropType).toBe('Wheat');
    });

    it('should tell Marathi from Hindi by marker words', () => {
      const result = classifier.classify(createQuery({ text: 'माझ्या पिकाला पाऊस कधी येईल?' }));

      expect(result.language).toBe('mr');
      expect(result.primary).toBe('weather');
    });

    it('should detect Tamil', () => {
      const result = classifier.classify(createQuery({ text: 'நாளை மழை பெய்யுமா?' }));

      expect(result.language).toBe('ta');
      expect(result.primary).toBe('weather');
    });

    it('should prefer a requested language over detection', () => {
      const result = classifier.classify(createQuery({ text: 'rain', language: 'hi' }));

      expect(result.language).toBe('hi');
      expect(result.languageSource).toBe('requested');
      expect(result.primary).toBe('weather');
    });
  });

  describe('Context', () => {
    it('should keep explicit context over inferred entities', () => {
      const result = classifier.classify(
        createQuery({ text: 'Will it rain in Mumbai?', context: { location: 'Pune' } }),
      );

      expect(result.entities.location).toBe('Mumbai');
      expect(result.context.location).toBe('Pune');
    });

    it('should not pair an inferred state with an explicit location', () => {
      const result = classifier.classify(
        createQuery({ text: 'Wheat prices in Punjab this rabi', context: { location: 'Pune' } }),
      );

      expect(result.entities.state).toBe('Punjab');
      expect(result.context).toEqual({ location: 'Pune', cropType: 'Wheat', season: 'Rabi' });
    });

    it('should add inferred entities missing from explicit context', () => {
      const result = classifier.classify(
        createQuery({ text: 'Best rice for 3 acres near Nagpur', context: { farmerCategory: 'small' } }),
      );

      expect(result.context).toEqual({
        farmerCategory: 'small',
        location: 'Nagpur',
        cropType: 'Rice',
        landArea: 3,
        landAreaUnit: 'acre',
      });
    });

    it('should return a frozen classification', () => {
      const result = classifier.classify(createQuery({ text: 'rain', comprehensive: true }));

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.context)).toBe(true);
      expect(Object.isFrozen(result.secondary)).toBe(true);
    });
  });
});
