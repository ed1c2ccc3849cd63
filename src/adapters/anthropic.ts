/**
 * Anthropic Messages API adapter
 */

import Anthropic from '@anthropic-ai/sdk';
import type { AnalysisAdapter, AnalysisResult } from '../types/index.js';
import type { AnthropicProfile } from '../config/schema.js';
import { classifyProviderError } from './errors.js';
import { ANALYSIS_TEMPERATURE, type AdapterOptions } from './openai.js';

export class AnthropicAdapter implements AnalysisAdapter {
  readonly label: string;
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(profile: AnthropicProfile, options: AdapterOptions) {
    this.client = new Anthropic({
      apiKey: profile.api_key,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
    this.model = profile.model;
    this.maxTokens = profile.max_tokens;
    this.label = `anthropic:${profile.model}`;
  }

  async analyze(prompt: string): Promise<AnalysisResult> {
    try {
      const message = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: ANALYSIS_TEMPERATURE,
        messages: [{ role: 'user', content: prompt }],
      });

      let response = '';
      for (const block of message.content) {
        if (block.type === 'text') {
          response = block.text;
          break;
        }
      }
      return { success: true, response };
    } catch (error) {
      return { success: false, error: classifyProviderError(error) };
    }
  }
}
