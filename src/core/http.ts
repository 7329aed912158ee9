import fetch from 'node-fetch';

import { describeError } from './errors.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type HttpResult =
  | { ok: true; status: number; body: JsonValue }
  | { ok: false; error: string };

export interface JsonRequest {
  method: 'GET' | 'POST';
  url: string;
  token: string;
  timeoutMs: number;
  query?: Record<string, string>;
  body?: unknown;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Single bearer-authenticated JSON request. Network failures, non-2xx
 * statuses, timeouts and unparseable bodies all come back as `ok: false`.
 */
export async function requestJson(request: JsonRequest): Promise<HttpResult> {
  let url: URL;
  try {
    url = new URL(request.url);
  } catch (error) {
    return { ok: false, error: `Invalid URL ${request.url}: ${describeError(error)}` };
  }
  for (const [name, value] of Object.entries(request.query ?? {})) {
    url.searchParams.set(name, value);
  }

  const headers: Record<string, string> = {
    Authorization: `Bearer ${request.token}`,
    Accept: 'application/json',
  };
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
  try {
    const response = await fetch(url.toString(), {
      method: request.method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: controller.signal,
    });
    const text = await response.text();
    if (!response.ok) {
      return { ok: false, error: `HTTP ${response.status}: ${text || 'no response body'}` };
    }
    try {
      return { ok: true, status: response.status, body: JSON.parse(text) };
    } catch (error) {
      return { ok: false, error: `Failed to parse response JSON: ${describeError(error)}` };
    }
  } catch (error) {
    if (controller.signal.aborted) {
      return { ok: false, error: `Request timed out after ${request.timeoutMs}ms` };
    }
    return { ok: false, error: describeError(error) };
  } finally {
    clearTimeout(timeout);
  }
}
