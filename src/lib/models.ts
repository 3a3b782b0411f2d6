/**
 * Pulse30 — Model Selection
 *
 * Picks the OpenAI model used for discussion discovery.
 * A pinned model always wins; otherwise the most preferred model the account
 * can see, falling back to DEFAULT_OPENAI_MODEL.
 */

import type { AppConfig } from './config';
import { fetchJson, type HttpClient } from './http';
import { errorMessage, logger } from './logger';
import { arrayField, isRecord } from './payload';

const OPENAI_MODELS_URL = 'https://api.openai.com/v1/models';

export const DEFAULT_OPENAI_MODEL = 'gpt-4.1';

/** Web-search capable models, most preferred first. */
export const OPENAI_MODEL_PREFERENCE = [
  'gpt-5',
  'gpt-4.1',
  'gpt-4o',
  'gpt-4.1-mini',
  'gpt-4o-mini',
];

/**
 * Choose from a list of available model ids.
 */
export function chooseOpenAIModel(available: string[]): string {
  const ids = new Set(available);
  return OPENAI_MODEL_PREFERENCE.find(id => ids.has(id)) ?? DEFAULT_OPENAI_MODEL;
}

/**
 * Ids from a /v1/models listing ({ data: [{ id }] }).
 */
export function parseModelList(response: unknown): string[] {
  return arrayField(response, 'data')
    .map(entry => (isRecord(entry) && typeof entry.id === 'string' ? entry.id : null))
    .filter((id): id is string => id !== null);
}

export interface ModelSelectionOptions {
  http?: HttpClient;
  /** Canned /v1/models response for mock runs */
  mockModels?: unknown;
}

/**
 * Resolve the OpenAI model for this run, or null when no key is configured.
 * Listing failures fall back to the default model.
 */
export async function selectOpenAIModel(
  config: AppConfig,
  options: ModelSelectionOptions = {}
): Promise<string | null> {
  if (config.openaiModelPolicy === 'pinned' && config.openaiModelPin) {
    return config.openaiModelPin;
  }

  if (options.mockModels !== undefined) {
    return chooseOpenAIModel(parseModelList(options.mockModels));
  }

  if (!config.openaiApiKey) return null;

  const http = options.http ?? fetchJson;
  try {
    const response = await http({
      url: OPENAI_MODELS_URL,
      headers: { Authorization: `Bearer ${config.openaiApiKey}` },
      timeoutMs: 15_000,
    });
    return chooseOpenAIModel(parseModelList(response));
  } catch (error) {
    logger.warn('Model listing failed, using default', {
      model: DEFAULT_OPENAI_MODEL,
      error: errorMessage(error),
    });
    return DEFAULT_OPENAI_MODEL;
  }
}
