/**
 * CLI commands index
 * Exports all command creators
 */

export { createScanCommand, runScan, parseWorkers, type ScanCommandOptions } from './scan.js';
export { createRulesCommand, runRulesList, splitList } from './rules.js';
export { loadCommandContext, type CommandContext } from './context.js';
