import { describe, expect, it } from 'vitest';
import { DEFAULT_RANKING_CONFIG, loadConfig } from '@/lib/config';
import { InputValidationError } from '@/lib/errors';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      apiKey: null,
      model: 'googleai/gemini-2.0-flash',
      embedder: 'googleai/text-embedding-004',
      topK: 10,
      kSnippets: 5,
      maxResumes: 30,
      maxFileSizeMb: 5,
      ranking: DEFAULT_RANKING_CONFIG,
    });
  });

  it('prefers GEMINI_API_KEY and falls back to GOOGLE_API_KEY', () => {
    expect(loadConfig({ GEMINI_API_KEY: 'test-key', GOOGLE_API_KEY: 'other-key' }).apiKey).toBe('test-key');
    expect(loadConfig({ GOOGLE_API_KEY: 'other-key' }).apiKey).toBe('other-key');
    expect(loadConfig({ GEMINI_API_KEY: '', GOOGLE_API_KEY: 'other-key' }).apiKey).toBe('other-key');
  });

  it('coerces numeric settings', () => {
    const config = loadConfig({ RANKER_TOP_K: '3', RANKER_MAX_FILE_MB: '2.5' });
    expect(config.topK).toBe(3);
    expect(config.maxFileSizeMb).toBe(2.5);
  });

  it('rejects out-of-range settings', () => {
    expect(() => loadConfig({ RANKER_TOP_K: '25' })).toThrow(InputValidationError);
    expect(() => loadConfig({ RANKER_TOP_K: 'many' })).toThrow(/^Invalid configuration for RANKER_TOP_K: /);
  });

  it('merges ranking overrides over the defaults', () => {
    const config = loadConfig({}, { skillBonus: 0.2, jdSkillLimit: 5 });
    expect(config.ranking).toEqual({ ...DEFAULT_RANKING_CONFIG, skillBonus: 0.2, jdSkillLimit: 5 });
  });

  it('rejects invalid ranking overrides', () => {
    expect(() => loadConfig({}, { fullTextWeight: 2 })).toThrow(/^Invalid ranking option fullTextWeight: /);
  });
});
