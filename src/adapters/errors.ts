/**
 * Provider error classification
 *
 * SDK and fetch failures are mapped onto the four ProviderErrorKind values by
 * duck-typing the thrown value, so the same rules apply to the OpenAI SDK, the
 * Anthropic SDK and plain fetch.
 */

import type { ProviderError, ProviderErrorKind } from '../types/index.js';

const TIMEOUT_NAMES = new Set(['APIConnectionTimeoutError', 'TimeoutError', 'AbortError']);
const AUTH_NAMES = new Set(['AuthenticationError', 'PermissionDeniedError']);
const CONNECTION_NAMES = new Set(['APIConnectionError', 'FetchError']);
const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'ECONNRESET', 'EAI_AGAIN']);

function readField(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

function errorNames(error: unknown): string[] {
  const names: string[] = [];
  const ctor = readField(error, 'constructor');
  const ctorName = readField(ctor, 'name');
  if (typeof ctorName === 'string') names.push(ctorName);
  const name = readField(error, 'name');
  if (typeof name === 'string') names.push(name);
  return names;
}

function errorCode(error: unknown): string | undefined {
  const code = readField(error, 'code');
  if (typeof code === 'string') return code;
  // fetch wraps socket errors in `cause`
  const causeCode = readField(readField(error, 'cause'), 'code');
  return typeof causeCode === 'string' ? causeCode : undefined;
}

/**
 * HTTP status carried by an error, if any
 */
function errorStatus(error: unknown): number | undefined {
  const status = readField(error, 'status');
  return typeof status === 'number' ? status : undefined;
}

/**
 * Map an HTTP status onto an error kind
 */
export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 408 || status === 504) return 'timeout';
  return 'other';
}

/**
 * Classify anything thrown by a provider call.
 */
export function classifyProviderError(error: unknown): ProviderError {
  const message = error instanceof Error ? error.message : String(error);
  const names = errorNames(error);
  const status = errorStatus(error);
  const code = errorCode(error);

  let kind: ProviderErrorKind = 'other';
  // Timeout errors subclass connection errors in the SDKs, so check them first
  if (names.some((n) => TIMEOUT_NAMES.has(n)) || code === 'ETIMEDOUT' || status === 408 || status === 504) {
    kind = 'timeout';
  } else if (names.some((n) => AUTH_NAMES.has(n)) || status === 401 || status === 403) {
    kind = 'auth';
  } else if (names.some((n) => CONNECTION_NAMES.has(n)) || (code !== undefined && CONNECTION_CODES.has(code))) {
    kind = 'connection';
  }

  return status === undefined ? { kind, message } : { kind, message, status };
}
