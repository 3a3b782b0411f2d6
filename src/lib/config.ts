/**
 * Pulse30 — Configuration
 *
 * Keys come from ~/.config/pulse30/.env (or PULSE30_CONFIG_FILE), with the
 * process environment taking precedence. The merged record is validated once
 * into an immutable AppConfig.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse } from 'dotenv';
import { z } from 'zod';
import type { SourceKey } from '../types';
import { SOURCE_ORDER } from '../types';
import { ConfigError } from './errors';
import { logger } from './logger';

export const DEFAULT_CONFIG_FILE = join(homedir(), '.config', 'pulse30', '.env');

// ============================================================
// SCHEMA
// ============================================================

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : null));

export const EnvSchema = z.object({
  OPENAI_API_KEY: optionalKey,
  TWITTERAPI_IO_KEY: optionalKey,
  XAI_API_KEY: optionalKey,
  DAILYDEV_API_KEY: optionalKey,
  TUBELAB_API_KEY: optionalKey,
  OPENAI_MODEL_POLICY: z.enum(['auto', 'pinned']).default('auto'),
  OPENAI_MODEL_PIN: optionalKey,
});

export type ModelPolicy = 'auto' | 'pinned';

export interface AppConfig {
  readonly openaiApiKey: string | null;
  readonly twitterApiKey: string | null;
  readonly dailydevApiKey: string | null;
  readonly tubelabApiKey: string | null;
  readonly openaiModelPolicy: ModelPolicy;
  readonly openaiModelPin: string | null;
  /** Set when the X key only came from the legacy XAI_API_KEY name */
  readonly legacyXKey: boolean;
}

// ============================================================
// LOADING
// ============================================================

function readConfigFile(path: string): Record<string, string> {
  if (!existsSync(path)) return {};
  return parse(readFileSync(path, 'utf-8'));
}

function pickDefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') result[key] = value;
  }
  return result;
}

/**
 * Validate a merged key/value record into AppConfig.
 *
 * @throws ConfigError on an invalid OPENAI_MODEL_POLICY
 */
export function parseConfig(values: Record<string, string | undefined>): AppConfig {
  const result = EnvSchema.safeParse(values);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`Invalid configuration: ${issue.path.join('.')}: ${issue.message}`);
  }

  const env = result.data;
  return Object.freeze({
    openaiApiKey: env.OPENAI_API_KEY,
    twitterApiKey: env.TWITTERAPI_IO_KEY ?? env.XAI_API_KEY,
    dailydevApiKey: env.DAILYDEV_API_KEY,
    tubelabApiKey: env.TUBELAB_API_KEY,
    openaiModelPolicy: env.OPENAI_MODEL_POLICY,
    openaiModelPin: env.OPENAI_MODEL_PIN,
    legacyXKey: !env.TWITTERAPI_IO_KEY && Boolean(env.XAI_API_KEY),
  });
}

/**
 * Load the config file and overlay the process environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const path = env.PULSE30_CONFIG_FILE || DEFAULT_CONFIG_FILE;
  const fileValues = readConfigFile(path);

  logger.debug('Loading configuration', { path, fromFile: Object.keys(fileValues).length });

  const config = parseConfig({ ...pickDefined(fileValues), ...pickDefined(env) });
  if (config.legacyXKey) {
    logger.warn('XAI_API_KEY is deprecated, rename it to TWITTERAPI_IO_KEY', { path });
  }
  return config;
}

// ============================================================
// SOURCE SELECTION
// ============================================================

export type SourceRequest = 'auto' | 'reddit' | 'x' | 'both';

export const SOURCE_REQUESTS: readonly SourceRequest[] = ['auto', 'reddit', 'x', 'both'];

export function isSourceRequest(value: string): value is SourceRequest {
  return SOURCE_REQUESTS.some(request => request === value);
}

export interface SelectionRequest {
  sources: SourceRequest;
  dailydev: boolean;
  youtube: boolean;
  /** Canned responses stand in for every key */
  mock: boolean;
}

export interface SourceSelection {
  selected: SourceKey[];
  /** Report label, e.g. "both", "reddit-only", "x-only+dailydev" */
  mode: string;
  credentials: Partial<Record<SourceKey, string>>;
}

const MOCK_KEY = 'mock';

function coreMode(reddit: boolean, x: boolean): string | null {
  if (reddit && x) return 'both';
  if (reddit) return 'reddit-only';
  if (x) return 'x-only';
  return null;
}

/**
 * Decide which sources run from the request and the configured keys.
 *
 * @throws ConfigError when a requested source has no key, or nothing is selectable
 */
export function resolveSources(request: SelectionRequest, config: AppConfig): SourceSelection {
  const keys: Record<SourceKey, string | null> = request.mock
    ? { reddit: MOCK_KEY, x: MOCK_KEY, dailydev: MOCK_KEY, youtube: MOCK_KEY }
    : {
        reddit: config.openaiApiKey,
        x: config.twitterApiKey,
        dailydev: config.dailydevApiKey,
        youtube: config.tubelabApiKey,
      };

  const hasReddit = Boolean(keys.reddit);
  const hasX = Boolean(keys.x);

  let reddit = false;
  let x = false;
  switch (request.sources) {
    case 'auto':
      reddit = hasReddit;
      x = hasX;
      break;
    case 'both':
      if (!hasReddit || !hasX) {
        const missing = hasReddit ? 'TWITTERAPI_IO_KEY' : 'OPENAI_API_KEY';
        throw new ConfigError(`Requested both sources but ${missing} is missing. Use --sources=auto to use available keys.`);
      }
      reddit = true;
      x = true;
      break;
    case 'reddit':
      if (!hasReddit) throw new ConfigError('Requested Reddit but OPENAI_API_KEY is missing.');
      reddit = true;
      break;
    case 'x':
      if (!hasX) throw new ConfigError('Requested X but TWITTERAPI_IO_KEY is missing.');
      x = true;
      break;
  }

  if (request.dailydev && !keys.dailydev) {
    throw new ConfigError('Requested daily.dev but DAILYDEV_API_KEY is missing.');
  }
  if (request.youtube && !keys.youtube) {
    throw new ConfigError('Requested YouTube but TUBELAB_API_KEY is missing.');
  }

  // daily.dev runs whenever it has a key; YouTube costs credits and stays opt-in.
  const dailydev = request.dailydev || Boolean(keys.dailydev);

  const wanted: Record<SourceKey, boolean> = {
    reddit,
    x,
    dailydev,
    youtube: request.youtube,
  };
  const selected = SOURCE_ORDER.filter(source => wanted[source]);

  if (selected.length === 0) {
    throw new ConfigError(`No API keys configured. Add at least one key to ${DEFAULT_CONFIG_FILE}`);
  }

  const credentials: Partial<Record<SourceKey, string>> = {};
  for (const source of selected) {
    const key = keys[source];
    if (key) credentials[source] = key;
  }

  const labels = [coreMode(reddit, x), dailydev ? 'dailydev' : null, request.youtube ? 'youtube' : null]
    .filter((label): label is string => label !== null);

  return { selected, mode: labels.join('+'), credentials };
}
