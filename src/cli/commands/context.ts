/**
 * Shared setup for commands: configuration, logger and rule store
 */

import type { Config } from '../../config/schema.js';
import { expandHome, loadConfig } from '../../config/index.js';
import { ScanLogger } from '../../logging/scan-logger.js';
import { RuleStore } from '../../rules/store.js';

export interface CommandContext {
  config: Config;
  logger: ScanLogger;
  rules: RuleStore;
}

export async function loadCommandContext(options: { verbose?: boolean } = {}): Promise<CommandContext> {
  const config = await loadConfig();
  const verbose = options.verbose ?? config.output.verbose;
  const logger = new ScanLogger({
    echo: verbose,
    debug: verbose,
    logFile: config.output.log_file ? expandHome(config.output.log_file) : undefined,
  });
  const rules = await RuleStore.open({ settings: config.rules, logger });
  return { config, logger, rules };
}
