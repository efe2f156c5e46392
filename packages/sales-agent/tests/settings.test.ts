import { describe, it, expect } from 'vitest';
import { assertStartupReady, loadSettings, validateSettings } from '../config/settings.js';
import { ConfigurationError } from '../utils/errors.js';

describe('loadSettings', () => {
  it('applies defaults for an empty environment', () => {
    const s = loadSettings({});

    expect(s.dataPath).toBe('sales_data_sample.csv');
    expect(s.generation).toEqual({
      apiKey: '',
      model: 'claude-haiku-4-5-20251001',
      temperature: 0.7,
      maxTokens: 1024,
    });
    expect(s.embedding).toEqual({
      apiKey: '',
      model: 'text-embedding-3-small',
      dimension: 384,
      itemDelayMs: 100,
      enrichText: true,
    });
    expect(s.vectorStore.backend).toBe('postgres');
    expect(s.vectorStore.collection).toBe('sales_data');
    expect(s.vectorStore.pg.port).toBe(5433);
    expect(s.rateLimit).toEqual({ maxRequests: 30, windowMs: 60_000 });
    expect(s.logLevel).toBe('info');
  });

  it('coerces numeric and boolean variables', () => {
    const s = loadSettings({
      EMBEDDING_DIMENSION: '8',
      RATE_LIMIT_WINDOW: '1.5',
      ENRICH_TEXT: 'no',
      VECTOR_BACKEND: 'local',
      PG_PORT: '5432',
    });

    expect(s.embedding.dimension).toBe(8);
    expect(s.rateLimit.windowMs).toBe(1500);
    expect(s.embedding.enrichText).toBe(false);
    expect(s.vectorStore.backend).toBe('local');
    expect(s.vectorStore.pg.port).toBe(5432);
  });

  it('treats empty strings as unset', () => {
    expect(loadSettings({ GENERATION_MODEL: '', DATA_PATH: '' }).dataPath).toBe('sales_data_sample.csv');
  });

  it('lists every malformed value', () => {
    try {
      loadSettings({ GENERATION_TEMPERATURE: '2', VECTOR_COLLECTION: 'Sales-Data' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (!(err instanceof ConfigurationError)) return;
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toMatch(/^GENERATION_TEMPERATURE: /);
      expect(err.issues[1]).toBe('VECTOR_COLLECTION: must be a lowercase SQL identifier');
    }
  });
});

describe('startup validation', () => {
  it('reports missing credentials and an unreachable data file', () => {
    const s = loadSettings({ DATA_PATH: 'missing.csv' });
    expect(validateSettings(s, () => false)).toEqual([
      'ANTHROPIC_API_KEY is required',
      'OPENAI_API_KEY is required',
      'Data file not found: missing.csv',
    ]);
    expect(() => assertStartupReady(s, () => false)).toThrow(ConfigurationError);
  });

  it('passes with credentials and a readable file', () => {
    const s = loadSettings({ ANTHROPIC_API_KEY: 'test-secret', OPENAI_API_KEY: 'test-secret' });
    expect(validateSettings(s, () => true)).toEqual([]);
    expect(() => assertStartupReady(s, () => true)).not.toThrow();
  });
});
