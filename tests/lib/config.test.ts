/**
 * Tests for configuration loading and source selection
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, parseConfig, resolveSources, type SelectionRequest } from '../../src/lib/config';
import { ConfigError } from '../../src/lib/errors';

const request = (overrides: Partial<SelectionRequest> = {}): SelectionRequest => ({
  sources: 'auto',
  dailydev: false,
  youtube: false,
  mock: false,
  ...overrides,
});

describe('Configuration', () => {
  describe('parseConfig', () => {
    it('should default every key to null and the policy to auto', () => {
      expect(parseConfig({})).toEqual({
        openaiApiKey: null,
        twitterApiKey: null,
        dailydevApiKey: null,
        tubelabApiKey: null,
        openaiModelPolicy: 'auto',
        openaiModelPin: null,
        legacyXKey: false,
      });
    });

    it('should fall back to the legacy XAI_API_KEY', () => {
      const config = parseConfig({ XAI_API_KEY: 'test-legacy' });
      expect(config.twitterApiKey).toBe('test-legacy');
      expect(config.legacyXKey).toBe(true);
    });

    it('should prefer TWITTERAPI_IO_KEY over the legacy name', () => {
      const config = parseConfig({ TWITTERAPI_IO_KEY: 'test-x', XAI_API_KEY: 'test-legacy' });
      expect(config.twitterApiKey).toBe('test-x');
      expect(config.legacyXKey).toBe(false);
    });

    it('should treat blank keys as missing', () => {
      expect(parseConfig({ OPENAI_API_KEY: '   ' }).openaiApiKey).toBeNull();
    });

    it('should reject an unknown model policy', () => {
      expect(() => parseConfig({ OPENAI_MODEL_POLICY: 'sometimes' })).toThrow(ConfigError);
    });

    it('should return a frozen config', () => {
      expect(Object.isFrozen(parseConfig({}))).toBe(true);
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'pulse30-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should read the config file and let the environment override it', () => {
      const file = join(dir, '.env');
      writeFileSync(file, 'OPENAI_API_KEY=file-key\nDAILYDEV_API_KEY=test-dd\n# comment\nOPENAI_MODEL_POLICY=pinned\nOPENAI_MODEL_PIN=gpt-4o\n');

      const config = loadConfig({ PULSE30_CONFIG_FILE: file, OPENAI_API_KEY: 'env-key' });

      expect(config.openaiApiKey).toBe('env-key');
      expect(config.dailydevApiKey).toBe('test-dd');
      expect(config.openaiModelPolicy).toBe('pinned');
      expect(config.openaiModelPin).toBe('gpt-4o');
    });

    it('should work without a config file', () => {
      const config = loadConfig({ PULSE30_CONFIG_FILE: join(dir, 'missing.env'), TUBELAB_API_KEY: 'test-yt' });

      expect(config.tubelabApiKey).toBe('test-yt');
      expect(config.openaiApiKey).toBeNull();
    });
  });

  describe('resolveSources', () => {
    const bothKeys = parseConfig({ OPENAI_API_KEY: 'test-openai', TWITTERAPI_IO_KEY: 'test-x' });
    const redditOnly = parseConfig({ OPENAI_API_KEY: 'test-openai' });

    it('should select every core source that has a key in auto mode', () => {
      expect(resolveSources(request(), bothKeys)).toEqual({
        selected: ['reddit', 'x'],
        mode: 'both',
        credentials: { reddit: 'test-openai', x: 'test-x' },
      });
    });

    it('should fall back to the available source in auto mode', () => {
      const selection = resolveSources(request(), redditOnly);
      expect(selection.selected).toEqual(['reddit']);
      expect(selection.mode).toBe('reddit-only');
    });

    it('should narrow to an explicitly requested source', () => {
      const selection = resolveSources(request({ sources: 'x', dailydev: true }), {
        ...bothKeys,
        dailydevApiKey: 'test-dd',
      });
      expect(selection.selected).toEqual(['x', 'dailydev']);
      expect(selection.mode).toBe('x-only+dailydev');
      expect(selection.credentials).toEqual({ x: 'test-x', dailydev: 'test-dd' });
    });

    it('should fail when a requested source has no key', () => {
      expect(() => resolveSources(request({ sources: 'both' }), redditOnly)).toThrow(/TWITTERAPI_IO_KEY/);
      expect(() => resolveSources(request({ sources: 'x' }), redditOnly)).toThrow(ConfigError);
      expect(() => resolveSources(request({ dailydev: true }), redditOnly)).toThrow(/DAILYDEV_API_KEY/);
      expect(() => resolveSources(request({ youtube: true }), redditOnly)).toThrow(/TUBELAB_API_KEY/);
    });

    it('should fail when nothing is selectable', () => {
      expect(() => resolveSources(request(), parseConfig({}))).toThrow(/No API keys configured/);
    });

    it('should run opt-in sources alone when they are the only keys', () => {
      const selection = resolveSources(request({ dailydev: true }), parseConfig({ DAILYDEV_API_KEY: 'test-dd' }));
      expect(selection.selected).toEqual(['dailydev']);
      expect(selection.mode).toBe('dailydev');
    });

    it('should enable daily.dev whenever its key is configured', () => {
      const selection = resolveSources(
        request(),
        parseConfig({ OPENAI_API_KEY: 'test-openai', DAILYDEV_API_KEY: 'test-dd' })
      );
      expect(selection.selected).toEqual(['reddit', 'dailydev']);
      expect(selection.mode).toBe('reddit-only+dailydev');
      expect(selection.credentials).toEqual({ reddit: 'test-openai', dailydev: 'test-dd' });
    });

    it('should keep YouTube opt-in even when its key is configured', () => {
      const selection = resolveSources(
        request(),
        parseConfig({ OPENAI_API_KEY: 'test-openai', TUBELAB_API_KEY: 'test-yt' })
      );
      expect(selection.selected).toEqual(['reddit']);
      expect(selection.mode).toBe('reddit-only');
    });

    it('should run daily.dev alone when it is the only key', () => {
      const selection = resolveSources(request(), parseConfig({ DAILYDEV_API_KEY: 'test-dd' }));
      expect(selection.selected).toEqual(['dailydev']);
      expect(selection.mode).toBe('dailydev');
    });

    it('should need no keys in mock mode', () => {
      const selection = resolveSources(request({ mock: true, youtube: true }), parseConfig({}));
      expect(selection.selected).toEqual(['reddit', 'x', 'dailydev', 'youtube']);
      expect(selection.mode).toBe('both+dailydev+youtube');
    });

    it('should include daily.dev in a plain mock run', () => {
      const selection = resolveSources(request({ mock: true }), parseConfig({}));
      expect(selection.selected).toEqual(['reddit', 'x', 'dailydev']);
      expect(selection.mode).toBe('both+dailydev');
      expect(selection.credentials).toEqual({ reddit: 'mock', x: 'mock', youtube: 'mock' });
    });
  });
});
