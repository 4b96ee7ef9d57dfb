import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '@field-advisor/advisor-contracts';
import { SpecialistRegistry, createRegistryFromConfig } from '../specialist-registry.js';
import { makeSpecialist } from './helpers.js';

describe('SpecialistRegistry', () => {
  const weather = makeSpecialist('weather', 'weather');
  const crop = makeSpecialist('crop', 'crop');
  const soil = makeSpecialist('soil', 'crop');
  const finance = makeSpecialist('finance', 'finance');

  describe('create', () => {
    it('should resolve categories in registration order', () => {
      const registry = SpecialistRegistry.create([weather, crop, finance, soil]);

      expect(registry.resolve('crop').map((s) => s.id)).toEqual(['crop', 'soil']);
      expect(registry.resolve('weather').map((s) => s.id)).toEqual(['weather']);
    });

    it('should resolve general to every specialist', () => {
      const registry = SpecialistRegistry.create([weather, crop, finance]);

      expect(registry.resolve('general').map((s) => s.id)).toEqual(['weather', 'crop', 'finance']);
    });

    it('should reject duplicate ids', () => {
      expect(() => SpecialistRegistry.create([weather, crop, finance, weather])).toThrow(
        "Duplicate specialist id 'weather'",
      );
    });

    it('should reject a domain category without specialists', () => {
      expect(() => SpecialistRegistry.create([weather, crop])).toThrow(ConfigurationError);
      expect(() => SpecialistRegistry.create([weather, crop])).toThrow(
        "No specialist registered for category 'finance'",
      );
    });

    it('should be frozen', () => {
      const registry = SpecialistRegistry.create([weather, crop, finance]);

      expect(Object.isFrozen(registry)).toBe(true);
      expect(Object.isFrozen(registry.getAll())).toBe(true);
    });
  });

  describe('lookup', () => {
    const registry = SpecialistRegistry.create([weather, crop, finance]);

    it('should get a specialist by id', () => {
      expect(registry.get('crop')).toBe(crop);
      expect(registry.get('missing')).toBeUndefined();
      expect(registry.count()).toBe(3);
    });

    it('should describe specialists', () => {
      expect(registry.describe()[0]).toEqual({
        id: 'weather',
        label: 'weather label',
        category: 'weather',
        description: 'weather description',
        capabilities: ['weather-advice'],
      });
    });
  });
});

describe('createRegistryFromConfig', () => {
  const factories = {
    weather: vi.fn(() => makeSpecialist('weather', 'weather')),
    crop: vi.fn(() => makeSpecialist('crop', 'crop')),
    soil: vi.fn(() => makeSpecialist('soil', 'crop')),
    finance: vi.fn(() => makeSpecialist('finance', 'finance')),
  };

  it('should enable specialists missing from the config', () => {
    const registry = createRegistryFromConfig({ specialists: {} }, factories);

    expect(registry.getAll().map((s) => s.id)).toEqual(['weather', 'crop', 'soil', 'finance']);
  });

  it('should skip disabled specialists and pass settings to factories', () => {
    const registry = createRegistryFromConfig(
      { specialists: { soil: { enabled: false }, weather: { enabled: true, timeoutMs: 250 } } },
      factories,
    );

    expect(registry.resolve('crop').map((s) => s.id)).toEqual(['crop']);
    expect(factories.weather).toHaveBeenLastCalledWith({ enabled: true, timeoutMs: 250 });
  });

  it('should reject config entries without a factory', () => {
    expect(() =>
      createRegistryFromConfig({ specialists: { market: { enabled: true } } }, factories),
    ).toThrow('Unknown specialist(s) in config: market');
  });

  it('should reject disabling the last specialist of a category', () => {
    expect(() =>
      createRegistryFromConfig({ specialists: { finance: { enabled: false } } }, factories),
    ).toThrow(ConfigurationError);
  });
});
