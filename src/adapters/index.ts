/**
 * Adapters module - builds the analysis adapter for a provider profile
 */

import type { AnalysisAdapter } from '../types/index.js';
import type { ProviderProfile } from '../config/schema.js';
import { OpenAICompatibleAdapter, type AdapterOptions } from './openai.js';
import { AnthropicAdapter } from './anthropic.js';
import { GenericHttpAdapter } from './http.js';

export { OpenAICompatibleAdapter, ANALYSIS_TEMPERATURE, type AdapterOptions } from './openai.js';
export { AnthropicAdapter } from './anthropic.js';
export { GenericHttpAdapter, extractResponseText } from './http.js';
export { classifyProviderError, kindForStatus } from './errors.js';

/**
 * Create the adapter serving a profile
 */
export function createAnalysisAdapter(profile: ProviderProfile, options: AdapterOptions): AnalysisAdapter {
  switch (profile.provider) {
    case 'openai':
    case 'deepseek':
      return new OpenAICompatibleAdapter(profile, options);
    case 'anthropic':
      return new AnthropicAdapter(profile, options);
    case 'custom':
      return new GenericHttpAdapter(profile, options);
  }
}
