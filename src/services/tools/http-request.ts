// Shared plumbing for the network tools

import type { ExecutionContext, ToolInput } from './types.js';
import { isPlainObject } from './validation.js';

export const DEFAULT_TIMEOUT_SECONDS = 30;

export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

export function requestHeaders(value: unknown): Record<string, string> {
  const headers: Record<string, string> = {};
  if (isPlainObject(value)) {
    for (const [key, header] of Object.entries(value)) {
      headers[key] = String(header);
    }
  }
  return headers;
}

/** Aborts on the call's own signal or after the tool's `timeout` argument, whichever comes first. */
export function requestSignal(ctx: ExecutionContext, args: ToolInput): AbortSignal {
  const timeoutSeconds = typeof args.timeout === 'number' ? args.timeout : DEFAULT_TIMEOUT_SECONDS;
  return AbortSignal.any([ctx.signal, AbortSignal.timeout(timeoutSeconds * 1000)]);
}

export function responseHeaders(response: Response): Record<string, string> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

export function parseJsonOr(body: string, fallback: unknown): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return fallback;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
