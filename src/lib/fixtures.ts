/**
 * Pulse30 — Mock Fixtures
 *
 * Canned backend responses under fixtures/, used by --mock runs and tests.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const FIXTURES_DIR = new URL('../../fixtures/', import.meta.url);

export const FIXTURE_FILES = {
  reddit: 'openai_reddit_sample.json',
  x: 'twitterapi_x_sample.json',
  dailydev: 'dailydev_sample.json',
  youtube: 'tubelab_sample.json',
  redditThread: 'reddit_thread_sample.json',
  models: 'models_openai_sample.json',
} as const;

export type FixtureName = keyof typeof FIXTURE_FILES;

/**
 * Mock runs use a fixed clock so the fixture dates fall inside the window.
 */
export const MOCK_NOW = new Date('2026-01-31T12:00:00Z');

export function fixturePath(name: FixtureName): string {
  return fileURLToPath(new URL(FIXTURE_FILES[name], FIXTURES_DIR));
}

export function loadFixture(name: FixtureName): unknown {
  return JSON.parse(readFileSync(fixturePath(name), 'utf-8'));
}
