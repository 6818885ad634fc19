import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { loadConfig } from './env.js';

describe('loadConfig', () => {
  it('fills in defaults around the API key', () => {
    expect(loadConfig({ OPENAI_API_KEY: 'test-key' })).toEqual({
      OPENAI_API_KEY: 'test-key',
      OPENAI_EMBED_MODEL: 'text-embedding-3-small',
      OPENAI_CHAT_MODEL: 'gpt-4o-mini',
      CHAPTER_FILE: 'data/understanding-media.txt',
      CHAPTER_NAME: 'Understanding Media',
      CHUNK_SIZE: 300,
      CHUNK_OVERLAP: 50,
      TOP_K: 3,
      PORT: 3000,
      API_MAX_ATTEMPTS: 3,
      SESSION_TTL_MINUTES: 30,
      MAX_SESSIONS: 1000,
      RESPONSE_LOG_FILE: 'logs/responses.log',
      NODE_ENV: 'development',
    });
  });

  it('parses numeric settings and treats blank values as unset', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-key',
      OPENAI_BASE_URL: '',
      CHUNK_SIZE: '120',
      CHUNK_OVERLAP: '0',
      TOP_K: ' ',
      PORT: '8080',
    });

    expect(config.OPENAI_BASE_URL).toBeUndefined();
    expect(config.CHUNK_SIZE).toBe(120);
    expect(config.CHUNK_OVERLAP).toBe(0);
    expect(config.TOP_K).toBe(3);
    expect(config.PORT).toBe(8080);
  });

  it('requires an API key', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: '  ' })).toThrow(
      'Invalid environment configuration: OPENAI_API_KEY: OPENAI_API_KEY is required',
    );
    expect(() => loadConfig({})).toThrow(ConfigurationError);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', CHUNK_SIZE: '50', CHUNK_OVERLAP: '50' })).toThrow(
      'Invalid environment configuration: CHUNK_OVERLAP: CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    );
  });

  it('rejects non-integer and non-positive numbers', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', PORT: 'abc' })).toThrow(/^Invalid environment configuration: PORT:/);
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', TOP_K: '0' })).toThrow(/TOP_K:/);
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', CHUNK_SIZE: '2.5' })).toThrow(/CHUNK_SIZE:/);
  });

  it('rejects a base URL that is not a URL', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', OPENAI_BASE_URL: 'not a url' })).toThrow(
      /OPENAI_BASE_URL:/,
    );
  });
});
