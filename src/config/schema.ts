/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

/**
 * OpenAI-compatible profile fields (OpenAI, DeepSeek and compatible gateways)
 */
const OpenAICompatibleFields = {
  model: z.string(),
  api_key: z.string().default(''),
  base_url: z.string().url().optional(),
  max_tokens: z.number().int().min(1).max(200000).default(8192),
  extra_body: z.record(z.string(), z.unknown()).optional(),
};

export const OpenAIProfileSchema = z.object({
  provider: z.literal('openai'),
  ...OpenAICompatibleFields,
});

export const DeepSeekProfileSchema = z.object({
  provider: z.literal('deepseek'),
  ...OpenAICompatibleFields,
});

export const AnthropicProfileSchema = z.object({
  provider: z.literal('anthropic'),
  model: z.string(),
  api_key: z.string().default(''),
  max_tokens: z.number().int().min(1).max(200000).default(8192),
});

export const CustomProfileSchema = z.object({
  provider: z.literal('custom'),
  api_url: z.string().url(),
  api_key: z.string().optional(),
  headers: z.record(z.string(), z.string()).default({}),
  params: z.record(z.string(), z.unknown()).default({}),
});

/**
 * A named provider profile
 */
export const ProviderProfileSchema = z.discriminatedUnion('provider', [
  OpenAIProfileSchema,
  DeepSeekProfileSchema,
  AnthropicProfileSchema,
  CustomProfileSchema,
]);

/**
 * Scan settings schema
 */
export const ScanSettingsSchema = z.object({
  profile: z.string().default('default'),
  excluded_dirs: z.array(z.string()).default(['node_modules', 'venv', '__pycache__', '.git']),
  excluded_files: z.array(z.string()).default(['.jpg', '.png', '.gif', '.mp4', '.zip', '.tar.gz']),
  max_file_size_mb: z.number().positive().default(10),
  timeout_seconds: z.number().positive().default(60),
  max_workers: z.number().int().min(1).max(64).default(5),
  /** Ask the provider for a project summary after each scan */
  summarize_project: z.boolean().default(true),
});

/**
 * Rule repository settings schema
 */
export const RuleSettingsSchema = z.object({
  store_dir: z.string().default('~/.sourcescan/rules'),
  update_url: z.string().default(''),
  auto_update: z.boolean().default(false),
  update_interval_days: z.number().positive().default(7),
  clone_retries: z.number().int().min(1).max(10).default(3),
  clone_timeout_seconds: z.number().positive().default(60),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  verbose: z.boolean().default(false),
  log_file: z.string().optional(),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  models: z.record(z.string(), ProviderProfileSchema),
  scan: ScanSettingsSchema,
  rules: RuleSettingsSchema,
  output: OutputSettingsSchema,
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type ProviderProfile = z.infer<typeof ProviderProfileSchema>;
export type OpenAIProfile = z.infer<typeof OpenAIProfileSchema>;
export type DeepSeekProfile = z.infer<typeof DeepSeekProfileSchema>;
export type AnthropicProfile = z.infer<typeof AnthropicProfileSchema>;
export type CustomProfile = z.infer<typeof CustomProfileSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type RuleSettings = z.infer<typeof RuleSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
