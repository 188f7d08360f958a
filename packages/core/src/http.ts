import { fetch, type Response } from 'undici';

export const USER_AGENT = 'labor-mcp/0.1';

type HeaderMap = Record<string, string>;

interface FetchOptions {
  method: 'GET' | 'POST';
  body?: string;
  headers: HeaderMap;
}

async function coreFetch(url: string, options: FetchOptions, timeoutMs = 30000) {
  const ctrl = new AbortController();
  const timeout = setTimeout(() => ctrl.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      method: options.method,
      body: options.body,
      signal: ctrl.signal,
      headers: {
        'User-Agent': USER_AGENT,
        ...options.headers
      }
    });

    if (!res.ok) {
      throw new Error(`${res.status} ${res.statusText} for ${url}`);
    }
    return res;
  } finally {
    clearTimeout(timeout);
  }
}

async function readJson(response: Response, url: string): Promise<unknown> {
  try {
    const json: unknown = await response.json();
    return json;
  } catch (error) {
    throw new Error(`Failed to parse JSON response from ${url}: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
}

/**
 * POST a JSON body and resolve to the parsed JSON reply.
 * Rejects on network errors, timeouts, non-2xx statuses and unparseable bodies.
 */
export async function postJSON(url: string, body: unknown, timeoutMs?: number): Promise<unknown> {
  const response = await coreFetch(url, {
    method: 'POST',
    body: JSON.stringify(body),
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json'
    }
  }, timeoutMs);
  return readJson(response, url);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
