/**
 * Environment Variable Handler Tests
 *
 * Tests for src/config/env.ts
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, hasApiKey, SETUP_INSTRUCTIONS, _clearEnvCache } from '../env.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('OPENAI_BASE_URL', '');
    vi.stubEnv('PINECONE_API_KEY', '');
    vi.stubEnv('PORT', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('loads OPENAI_API_KEY when set', () => {
      vi.stubEnv('OPENAI_API_KEY', 'sk-test-openai-key');

      expect(loadEnv().OPENAI_API_KEY).toBe('sk-test-openai-key');
    });

    it('treats empty values as unset', () => {
      const env = loadEnv();

      expect(env.OPENAI_API_KEY).toBeUndefined();
      expect(env.PINECONE_API_KEY).toBeUndefined();
      expect(env.PORT).toBeUndefined();
    });

    it('coerces PORT to a number', () => {
      vi.stubEnv('PORT', '8080');

      expect(loadEnv().PORT).toBe(8080);
    });

    it('drops malformed overrides and keeps the keys', () => {
      vi.stubEnv('PORT', 'eighty');
      vi.stubEnv('OPENAI_BASE_URL', 'not a url');
      vi.stubEnv('OPENAI_API_KEY', 'sk-test-key');

      const env = loadEnv();

      expect(env.PORT).toBeUndefined();
      expect(env.OPENAI_BASE_URL).toBeUndefined();
      expect(env.OPENAI_API_KEY).toBe('sk-test-key');
    });

    it('caches environment variables after first load', () => {
      vi.stubEnv('OPENAI_API_KEY', 'sk-first');
      loadEnv();
      vi.stubEnv('OPENAI_API_KEY', 'sk-second');

      expect(loadEnv().OPENAI_API_KEY).toBe('sk-first');

      _clearEnvCache();
      expect(loadEnv().OPENAI_API_KEY).toBe('sk-second');
    });
  });

  describe('getEnv()', () => {
    it('returns a single variable', () => {
      vi.stubEnv('PINECONE_API_KEY', 'test-secret');

      expect(getEnv('PINECONE_API_KEY')).toBe('test-secret');
    });
  });

  describe('hasApiKey()', () => {
    it('reports presence without the value', () => {
      vi.stubEnv('OPENAI_API_KEY', 'sk-test');

      expect(hasApiKey('openai')).toBe(true);
      expect(hasApiKey('pinecone')).toBe(false);
    });

    it('treats whitespace-only keys as missing', () => {
      vi.stubEnv('PINECONE_API_KEY', '   ');

      expect(hasApiKey('pinecone')).toBe(false);
    });
  });

  describe('SETUP_INSTRUCTIONS', () => {
    it('names the variable to set for each service', () => {
      expect(SETUP_INSTRUCTIONS.openai).toContain('OPENAI_API_KEY');
      expect(SETUP_INSTRUCTIONS.pinecone).toContain('PINECONE_API_KEY');
    });
  });
});
