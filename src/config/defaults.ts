/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Base URL used for DeepSeek profiles that do not set one
 */
export const DEEPSEEK_BASE_URL = 'https://api.deepseek.com';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  models: {
    default: {
      provider: 'deepseek',
      model: 'deepseek-chat',
      api_key: '',
      base_url: DEEPSEEK_BASE_URL,
      max_tokens: 8192,
    },
    deepseek: {
      provider: 'deepseek',
      model: 'deepseek-chat',
      api_key: '',
      base_url: DEEPSEEK_BASE_URL,
      max_tokens: 8192,
    },
    openai: {
      provider: 'openai',
      model: 'gpt-4o-mini',
      api_key: '',
      max_tokens: 8192,
    },
    anthropic: {
      provider: 'anthropic',
      model: 'claude-3-5-sonnet-20241022',
      api_key: '',
      max_tokens: 8192,
    },
  },
  scan: {
    profile: 'default',
    excluded_dirs: ['node_modules', 'venv', '__pycache__', '.git'],
    excluded_files: ['.jpg', '.png', '.gif', '.mp4', '.zip', '.tar.gz'],
    max_file_size_mb: 10,
    timeout_seconds: 60,
    max_workers: 5,
    summarize_project: true,
  },
  rules: {
    store_dir: '~/.sourcescan/rules',
    update_url: '',
    auto_update: false,
    update_interval_days: 7,
    clone_retries: 3,
    clone_timeout_seconds: 60,
  },
  output: {
    verbose: false,
  },
};

/**
 * Global config directory, relative to the home directory
 */
export const GLOBAL_CONFIG_DIR = '.sourcescan';

/**
 * Config file name in the global directory
 */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Rule repository document name
 */
export const RULES_FILE_NAME = 'rules.json';

/**
 * Last-update side record name
 */
export const LAST_UPDATE_FILE_NAME = 'last_update.json';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  API_KEY: 'SOURCESCAN_API_KEY',
  MODEL_PROFILE: 'SOURCESCAN_MODEL_PROFILE',
  MAX_WORKERS: 'SOURCESCAN_MAX_WORKERS',
  LOG_LEVEL: 'SOURCESCAN_LOG_LEVEL',
} as const;
