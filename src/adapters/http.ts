/**
 * Generic HTTP adapter
 * POSTs the prompt as JSON to a user-configured endpoint
 */

import type { AnalysisAdapter, AnalysisResult } from '../types/index.js';
import type { CustomProfile } from '../config/schema.js';
import { classifyProviderError, kindForStatus } from './errors.js';
import type { AdapterOptions } from './openai.js';

const RESPONSE_FIELDS = ['response', 'output', 'result'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the completion text out of an endpoint's JSON payload
 */
export function extractResponseText(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  if (isRecord(payload)) {
    for (const field of RESPONSE_FIELDS) {
      const value = payload[field];
      if (typeof value === 'string') return value;
    }
  }
  return JSON.stringify(payload);
}

export class GenericHttpAdapter implements AnalysisAdapter {
  readonly label: string;
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly params: Record<string, unknown>;
  private readonly timeoutMs: number;

  constructor(profile: CustomProfile, options: AdapterOptions) {
    this.url = profile.api_url;
    this.params = profile.params;
    this.timeoutMs = options.timeoutMs;

    const headers: Record<string, string> = { 'Content-Type': 'application/json', ...profile.headers };
    const hasAuthorization = Object.keys(headers).some((h) => h.toLowerCase() === 'authorization');
    if (profile.api_key && !hasAuthorization) {
      headers.Authorization = `Bearer ${profile.api_key}`;
    }
    this.headers = headers;
    this.label = `custom:${new URL(profile.api_url).host}`;
  }

  async analyze(prompt: string): Promise<AnalysisResult> {
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({ prompt, ...this.params }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.status !== 200) {
        const body = await response.text();
        return {
          success: false,
          error: {
            kind: kindForStatus(response.status),
            message: `HTTP ${response.status}: ${body.slice(0, 200)}`,
            status: response.status,
          },
        };
      }

      const payload: unknown = await response.json();
      return { success: true, response: extractResponseText(payload) };
    } catch (error) {
      return { success: false, error: classifyProviderError(error) };
    }
  }
}
