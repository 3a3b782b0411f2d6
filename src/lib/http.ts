/**
 * Pulse30 — HTTP Transport
 *
 * Thin JSON transport over the global fetch.
 * Adapters receive it as an injectable HttpClient so tests never touch the network.
 */

import { ParseError, TransportError } from './errors';
import { logger } from './logger';

export interface HttpRequest {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Serialized as JSON */
  body?: unknown;
  timeoutMs?: number;
}

export type HttpClient = (request: HttpRequest) => Promise<unknown>;

const DEFAULT_TIMEOUT_MS = 30_000;
const USER_AGENT = 'pulse30/0.1 (research aggregator)';

/**
 * Issue a request and decode its JSON body.
 *
 * @throws TransportError on network failure, timeout or non-2xx status
 * @throws ParseError when a 2xx body is not JSON
 */
export const fetchJson: HttpClient = async (request) => {
  const method = request.method ?? 'GET';
  const headers: Record<string, string> = {
    'User-Agent': USER_AGENT,
    Accept: 'application/json',
    ...request.headers,
  };

  let body: string | undefined;
  if (request.body !== undefined) {
    body = JSON.stringify(request.body);
    headers['Content-Type'] = 'application/json';
  }

  logger.debug('HTTP request', { method, url: request.url });

  let res: Response;
  try {
    res = await fetch(request.url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(request.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransportError(`Request failed: ${reason}`, request.url);
  }

  const text = await res.text();

  if (!res.ok) {
    const detail = text.slice(0, 200).trim();
    throw new TransportError(
      `HTTP ${res.status}${detail ? `: ${detail}` : ''}`,
      request.url,
      res.status
    );
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new ParseError(`Invalid JSON from ${request.url}`);
  }
};
