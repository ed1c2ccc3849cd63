/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { homedir } from 'node:os';
import { ConfigSchema, type Config, type ProviderProfile } from './schema.js';
import { DEFAULT_CONFIG, GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME, ENV_VARS } from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('sourcescan', {
  searchPlaces: [
    'sourcescan.config.yaml',
    'sourcescan.config.yml',
    '.sourcescanrc.yaml',
    '.sourcescanrc.yml',
    '.sourcescanrc',
    '.sourcescan/config.yaml',
    '.sourcescan/config.yml',
  ],
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

type Env = Record<string, string | undefined>;

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Directory to start the project config search from */
  cwd?: string;
  /** Global config path; defaults to ~/.sourcescan/config.yaml */
  globalConfigPath?: string;
  env?: Env;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load global configuration from ~/.sourcescan/config.yaml
 */
async function loadGlobalConfig(globalConfigPath: string): Promise<Record<string, unknown>> {
  try {
    const content = await fs.readFile(globalConfigPath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    return isRecord(parsed) ? parsed : {};
  } catch {
    // Global config doesn't exist, return empty
    return {};
  }
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<Record<string, unknown>> {
  try {
    const result = await explorer.search(cwd);
    if (result && !result.isEmpty && isRecord(result.config)) {
      return result.config;
    }
  } catch (error) {
    console.warn('Ignoring unreadable project config:', error instanceof Error ? error.message : error);
  }
  return {};
}

/**
 * Load configuration overrides from environment variables
 */
export function loadEnvConfig(env: Env): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  const scan: Record<string, unknown> = {};

  const profile = env[ENV_VARS.MODEL_PROFILE];
  if (profile) {
    scan.profile = profile;
  }

  const maxWorkers = env[ENV_VARS.MAX_WORKERS];
  if (maxWorkers) {
    const parsed = parseInt(maxWorkers, 10);
    if (!isNaN(parsed) && parsed >= 1 && parsed <= 64) {
      scan.max_workers = parsed;
    }
  }

  if (Object.keys(scan).length > 0) {
    config.scan = scan;
  }

  const apiKey = env[ENV_VARS.API_KEY];
  if (apiKey) {
    config.models = { [profile || 'default']: { api_key: apiKey } };
  }

  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    config.output = { verbose: true };
  }

  return config;
}

/**
 * Deep merge configuration objects
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key in source) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return path.join(homedir(), p.slice(2));
  return p;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > global config > defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const globalConfigPath =
    options.globalConfigPath ?? path.join(homedir(), GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);

  const globalConfig = await loadGlobalConfig(globalConfigPath);
  const projectConfig = await loadProjectConfig(options.cwd);
  const envConfig = loadEnvConfig(options.env ?? process.env);

  // Merge in priority order
  let merged = deepMerge(DEFAULT_CONFIG, globalConfig);
  merged = deepMerge(merged, projectConfig);
  merged = deepMerge(merged, envConfig);

  // Validate final config
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    console.warn('Configuration validation warnings:', result.error.format());
    // Return defaults if validation fails
    return DEFAULT_CONFIG;
  }

  return result.data;
}

/**
 * Resolved provider profile
 */
export interface ResolvedProfile {
  name: string;
  profile: ProviderProfile;
}

function hasCredentials(profile: ProviderProfile): boolean {
  switch (profile.provider) {
    case 'openai':
    case 'deepseek':
    case 'anthropic':
      return profile.api_key.length > 0;
    case 'custom':
      // Custom endpoints may not need a key
      return true;
  }
}

/**
 * Resolve a named provider profile.
 * Unknown names, and profiles without an API key, fall back to `default`.
 *
 * @throws Error when neither the named profile nor `default` exists.
 */
export function resolveProfile(config: Config, name: string = config.scan.profile): ResolvedProfile {
  const requested = config.models[name];
  if (requested && (hasCredentials(requested) || name === 'default')) {
    return { name, profile: requested };
  }

  const fallback = config.models.default;
  if (!fallback) {
    throw new Error(`Model profile "${name}" not found and no default profile is configured`);
  }
  if (requested) {
    console.warn(`No API key configured for model profile "${name}", using "default"`);
  }
  return { name: 'default', profile: fallback };
}
