import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileHistoryStorage } from '@field-advisor/advisor-orchestrator';
import { createOpenAILLM } from '../cli/context.js';
import { INVALID_QUERY_EXIT_CODE } from '../cli/commands/ask.js';
import { createHarness, writeConfig } from './helpers.js';

describe('field-advisor CLI', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'advisor-cli-'));
    await writeConfig(cwd, 'history:\n  enabled: false\n');
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  describe('ask', () => {
    it('prints the synthesized advice', async () => {
      const cli = createHarness(cwd, 'Rain likely by evening.\n- Cover harvested grain\n- [high] Delay irrigation');

      const code = await cli.run('ask', 'Will', 'it', 'rain', 'in', 'Pune', 'tomorrow');

      expect(code).toBe(0);
      expect(cli.stdout()).toBe(
        [
          'Weather Specialist: Rain likely by evening.',
          '',
          'Recommendations:',
          '  1. [high] Delay irrigation (Weather Specialist)',
          '  2. Cover harvested grain (Weather Specialist)',
          '',
          'Confidence: 0.06 | Sources: Weather Specialist',
          '',
        ].join('\n'),
      );
    });

    it('prints the transport response with --json', async () => {
      const cli = createHarness(cwd);

      const code = await cli.run('ask', '--json', 'Will it rain in Pune tomorrow');

      expect(code).toBe(0);
      const body: unknown = JSON.parse(cli.stdout());
      expect(body).toMatchObject({
        success: true,
        confidence: 1 / 18,
        source: 'Weather Specialist',
        recommendations: [
          { text: 'Delay irrigation', priority: 'high', category: 'weather', source: 'Weather Specialist' },
        ],
      });
      expect(body).not.toHaveProperty('failures');
    });

    it('hands --context pairs to the specialist prompt', async () => {
      const cli = createHarness(cwd);

      await cli.run('ask', '--context', 'location=Pune', '--context', 'crop_type=rice', 'When should I irrigate');

      expect(cli.complete).toHaveBeenCalledTimes(1);
      expect(cli.complete.mock.calls[0]?.[0]).toBe(
        'Farmer details:\nLocation: Pune\nCrop: rice\n\nQuestion: When should I irrigate',
      );
    });

    it('passes a requested language to the prompt', async () => {
      const cli = createHarness(cwd);

      await cli.run('ask', '--language', 'mr', 'Will it rain?');

      expect(cli.complete.mock.calls[0]?.[1]?.systemPrompt).toContain('Answer in Marathi.');
    });

    it('reports failed specialists and exits 1 when nothing succeeded', async () => {
      const cli = createHarness(cwd);
      cli.complete.mockRejectedValue(new Error('LLM down'));

      const code = await cli.run('ask', 'Will it rain tomorrow');

      expect(code).toBe(1);
      expect(cli.stdout()).toBe(
        [
          'No specialist could answer this query.',
          '',
          'Partial failures:',
          '  - weather (weather) failure: LLM down',
          '',
          'Confidence: 0.00 | Sources: none',
          '',
        ].join('\n'),
      );
    });

    it('rejects an unsupported language before dispatching', async () => {
      const cli = createHarness(cwd);

      const code = await cli.run('ask', '--language', 'fr', 'Will it rain?');

      expect(code).toBe(INVALID_QUERY_EXIT_CODE);
      expect(cli.stderr().startsWith('Invalid query:\n  • language: ')).toBe(true);
      expect(cli.complete).not.toHaveBeenCalled();
    });

    it('rejects a malformed --context pair', async () => {
      const cli = createHarness(cwd);

      const code = await cli.run('ask', '--context', 'novalue', 'Will it rain?');

      expect(code).toBe(1);
      expect(cli.stderr()).toContain('Context must be key=value.');
    });

    it('fails with a configuration error for a missing --config file', async () => {
      const cli = createHarness(cwd);

      const code = await cli.run('ask', '--config', 'missing.yml', 'Will it rain?');

      expect(code).toBe(1);
      expect(cli.stderr().startsWith(`Error: Cannot read config file ${join(cwd, 'missing.yml')}: `)).toBe(true);
    });

    it('requires an OpenAI key with the default LLM', async () => {
      const cli = createHarness(cwd);
      cli.ctx.createLLM = createOpenAILLM;

      const code = await cli.run('ask', 'Will it rain?');

      expect(code).toBe(1);
      expect(cli.stderr()).toBe('Error: OpenAI API key is required (set OPENAI_API_KEY)\n');
    });
  });

  describe('ask --specialist', () => {
    it('routes the question to the named specialist only', async () => {
      const cli = createHarness(cwd, 'Sow after the first rain.\n- [medium] Test soil moisture');

      const code = await cli.run('ask', '--specialist', 'crop', '--comprehensive', '--json', 'Will it rain in Pune tomorrow');

      expect(code).toBe(0);
      expect(cli.complete).toHaveBeenCalledTimes(1);
      expect(JSON.parse(cli.stdout())).toMatchObject({
        success: true,
        source: 'Crop Specialist',
        recommendations: [
          { text: 'Test soil moisture', priority: 'medium', category: 'crop', source: 'Crop Specialist' },
        ],
      });
    });

    it('rejects an unknown specialist before dispatching', async () => {
      const cli = createHarness(cwd);

      const code = await cli.run('ask', '--specialist', 'soil', 'Will it rain?');

      expect(code).toBe(1);
      expect(cli.stderr()).toBe("Error: Unknown specialist 'soil'\n");
      expect(cli.complete).not.toHaveBeenCalled();
    });
  });

  describe('examples', () => {
    it('prints one category', async () => {
      const cli = createHarness(cwd);

      expect(await cli.run('examples', '--category', 'finance')).toBe(0);
      expect(cli.stdout()).toBe(
        [
          'finance',
          '  [en] What loans are available for small farmers?',
          '  [en] How do I apply for crop insurance?',
          '  [hi] किसानों के लिए कौन से ऋण उपलब्ध हैं?',
          '  [hi] PM-KISAN योजना के बारे में बताएं',
          '',
        ].join('\n'),
      );
    });

    it('prints every category with --json', async () => {
      const cli = createHarness(cwd);

      expect(await cli.run('examples', '--json')).toBe(0);
      const body: Record<string, unknown> = JSON.parse(cli.stdout());
      expect(Object.keys(body)).toEqual(['weather', 'crop', 'finance']);
      expect(body).toMatchObject({ weather: expect.arrayContaining([{ language: 'hi', text: 'क्या आज बारिश होगी?' }]) });
    });

    it('rejects an unknown category', async () => {
      const cli = createHarness(cwd);

      expect(await cli.run('examples', '--category', 'soil')).toBe(1);
      expect(cli.stderr()).toContain('Expected one of: weather, crop, finance.');
    });
  });

  describe('specialists', () => {
    it('lists the enabled specialists', async () => {
      const cli = createHarness(cwd);

      expect(await cli.run('specialists')).toBe(0);
      expect(cli.stdout().split('\n').filter((line) => !line.startsWith(' '))).toEqual([
        'weather  Weather Specialist (weather)',
        'crop  Crop Specialist (crop)',
        'finance  Finance Specialist (finance)',
        '',
      ]);
    });

    it('shows configured time budgets', async () => {
      await writeConfig(cwd, 'specialists:\n  weather:\n    timeoutMs: 9000\n');
      const cli = createHarness(cwd);

      await cli.run('specialists', '--json');

      const specialists: unknown = JSON.parse(cli.stdout());
      expect(specialists).toEqual([
        expect.objectContaining({ id: 'weather', timeoutMs: 9000 }),
        expect.not.objectContaining({ timeoutMs: expect.anything() }),
        expect.not.objectContaining({ timeoutMs: expect.anything() }),
      ]);
    });

    it('refuses a config that leaves a category without a specialist', async () => {
      await writeConfig(cwd, 'specialists:\n  finance:\n    enabled: false\n');
      const cli = createHarness(cwd);

      expect(await cli.run('specialists')).toBe(1);
      expect(cli.stderr()).toBe("Error: No specialist registered for category 'finance'\n");
    });

    it('refuses unknown specialists in config', async () => {
      await writeConfig(cwd, 'specialists:\n  soil:\n    enabled: true\n');
      const cli = createHarness(cwd);

      expect(await cli.run('specialists')).toBe(1);
      expect(cli.stderr()).toBe('Error: Unknown specialist(s) in config: soil\n');
    });
  });

  describe('languages', () => {
    it('lists the ten supported languages', async () => {
      const cli = createHarness(cwd);

      expect(await cli.run('languages')).toBe(0);
      const lines = cli.stdout().trimEnd().split('\n');
      expect(lines).toHaveLength(10);
      expect(lines[0]).toBe('en  English');
      expect(lines).toContain('ta  Tamil');
    });

    it('prints code and name pairs with --json', async () => {
      const cli = createHarness(cwd);

      await cli.run('languages', '--json');

      expect(JSON.parse(cli.stdout())).toContainEqual({ code: 'pa', name: 'Punjabi' });
    });
  });

  describe('history', () => {
    it('lists and shows a saved run', async () => {
      await writeConfig(cwd, 'history:\n  enabled: true\n');
      const cli = createHarness(cwd);
      await cli.run('ask', 'Will it rain in Pune tomorrow');

      const storage = new FileHistoryStorage(cwd);
      await vi.waitFor(async () => {
        expect(await storage.getIndex()).toHaveLength(1);
      });
      const [entry] = await storage.getIndex();

      const listing = createHarness(cwd);
      expect(await listing.run('history', 'list')).toBe(0);
      expect(listing.stdout().startsWith(`${entry?.sessionId}  `)).toBe(true);
      expect(listing.stdout().trimEnd().endsWith('✓ weather/en  0.06  Will it rain in Pune tomorrow')).toBe(true);

      const shown = createHarness(cwd);
      expect(await shown.run('history', 'show', entry?.sessionId ?? '')).toBe(0);
      expect(shown.stdout()).toContain('\nQuery: Will it rain in Pune tomorrow\n');
      expect(shown.stdout()).toContain('\nCategory: weather\n');
      expect(shown.stdout()).toContain('Weather Specialist: Rain likely by evening.');
    });

    it('prints an empty listing', async () => {
      const cli = createHarness(cwd);

      await cli.run('history', 'list');

      expect(cli.stdout()).toBe('No history yet.\n');
    });

    it('reports an unknown session', async () => {
      const cli = createHarness(cwd);

      expect(await cli.run('history', 'show', 'missing-session')).toBe(1);
      expect(cli.stderr()).toBe('Session not found: missing-session\n');
    });

    it('rejects a non-numeric --limit', async () => {
      const cli = createHarness(cwd);

      expect(await cli.run('history', 'list', '--limit', 'ten')).toBe(1);
      expect(cli.stderr()).toContain('Limit must be a positive integer.');
    });
  });

  it('prints the version', async () => {
    const cli = createHarness(cwd);

    expect(await cli.run('--version')).toBe(0);
    expect(cli.stdout()).toBe('0.1.0\n');
  });
});
