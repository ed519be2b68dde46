/**
 * Minimal JSON-over-HTTP client for the Ollama API.
 */

import { LlmError, errorMessage } from '../utils/errors.js';

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path}`;
}

async function request(
  baseUrl: string,
  path: string,
  init: { method: 'GET' | 'POST'; body?: unknown; signal?: AbortSignal },
): Promise<unknown> {
  const url = joinUrl(baseUrl, path);

  let response: Response;
  try {
    response = await fetch(url, {
      method: init.method,
      headers: init.body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal: init.signal,
    });
  } catch (error) {
    if (init.signal?.aborted) {
      throw new LlmError(`Ollama request to ${path} aborted`, 'LLM_TIMEOUT', error);
    }
    throw new LlmError(`Ollama unreachable at ${baseUrl}: ${errorMessage(error)}`, 'LLM_UNAVAILABLE', error);
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => '');
    throw new LlmError(
      `Ollama ${path} returned ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`,
      'LLM_UNAVAILABLE',
    );
  }

  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    throw new LlmError(`Ollama ${path} returned invalid JSON`, 'LLM_BAD_RESPONSE', error);
  }
}

/**
 * POST a JSON body and return the parsed response.
 *
 * @throws LlmError LLM_UNAVAILABLE | LLM_TIMEOUT | LLM_BAD_RESPONSE
 */
export function postJson(
  baseUrl: string,
  path: string,
  body: unknown,
  signal?: AbortSignal,
): Promise<unknown> {
  return request(baseUrl, path, { method: 'POST', body, signal });
}

/**
 * GET and return the parsed response.
 */
export function getJson(baseUrl: string, path: string, signal?: AbortSignal): Promise<unknown> {
  return request(baseUrl, path, { method: 'GET', signal });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
