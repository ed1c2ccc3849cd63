/**
 * OpenAI-compatible adapter
 * Serves OpenAI, DeepSeek and any gateway speaking the chat completions API
 *
 * Uses OpenAI SDK with custom baseURL for compatible providers
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { AnalysisAdapter, AnalysisResult } from '../types/index.js';
import type { DeepSeekProfile, OpenAIProfile } from '../config/schema.js';
import { DEEPSEEK_BASE_URL } from '../config/defaults.js';
import { classifyProviderError } from './errors.js';

export const ANALYSIS_TEMPERATURE = 0.1;

export interface AdapterOptions {
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

export class OpenAICompatibleAdapter implements AnalysisAdapter {
  readonly label: string;
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly extraBody: Record<string, unknown>;

  constructor(profile: OpenAIProfile | DeepSeekProfile, options: AdapterOptions) {
    const baseURL = profile.base_url ?? (profile.provider === 'deepseek' ? DEEPSEEK_BASE_URL : undefined);
    this.client = new OpenAI({
      apiKey: profile.api_key,
      baseURL,
      timeout: options.timeoutMs,
      // Retries would multiply the per-file timeout
      maxRetries: 0,
    });
    this.model = profile.model;
    this.maxTokens = profile.max_tokens;
    this.extraBody = profile.extra_body ?? {};
    this.label = `${profile.provider}:${profile.model}`;
  }

  async analyze(prompt: string): Promise<AnalysisResult> {
    const baseParams: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: ANALYSIS_TEMPERATURE,
      max_tokens: this.maxTokens,
    };
    // Provider-specific body fields never override the core request
    const params: ChatCompletionCreateParamsNonStreaming = Object.assign({}, this.extraBody, baseParams);

    try {
      const completion = await this.client.chat.completions.create(params);
      return { success: true, response: completion.choices[0]?.message?.content ?? '' };
    } catch (error) {
      return { success: false, error: classifyProviderError(error) };
    }
  }
}
