/**
 * CLI command: sourcescan rules
 */

import { Command } from 'commander';
import path from 'node:path';
import type { ImportOutcome } from '../../rules/store.js';
import {
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printListItem,
  printSuccess,
  printWarning,
} from '../output.js';
import { loadCommandContext } from './context.js';

/**
 * Print the buckets, or the rules of one bucket
 */
export async function runRulesList(language?: string): Promise<void> {
  const { rules } = await loadCommandContext();

  if (!language) {
    printHeader(`Rules (${rules.ruleCount()})`);
    const buckets = rules.getBuckets();
    for (const name of rules.listLanguages()) {
      printKeyValue(name, buckets[name].length);
    }
    return;
  }

  const bucket = rules.getBuckets()[language.toLowerCase()];
  if (!bucket) {
    printWarning(`No rules for ${language}`);
    return;
  }
  printHeader(`Rules for ${language.toLowerCase()} (${bucket.length})`);
  for (const rule of bucket) {
    printListItem(`${rule.id} [${rule.severity}] ${rule.name}`);
  }
}

function reportOutcome(outcome: ImportOutcome, source: string): void {
  if (outcome.success) {
    printSuccess(`Imported ${outcome.count} new rules from ${source}`);
  } else {
    printError(`Import from ${source} failed; existing rules are unchanged`);
    process.exitCode = 1;
  }
}

export function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function createRulesCommand(): Command {
  const cmd = new Command('rules').description('Manage the rule repository');

  cmd
    .command('list')
    .description('List rule buckets, or the rules for one language')
    .argument('[language]', 'Language bucket')
    .action(async (language: string | undefined) => {
      await runRulesList(language);
    });

  cmd
    .command('import-dir')
    .description('Import dialect rules from a directory of YAML files')
    .argument('<dir>', 'Rule directory')
    .action(async (dir: string) => {
      const { rules, logger } = await loadCommandContext();
      reportOutcome(await rules.importDirectory(path.resolve(dir)), dir);
      await logger.flush();
    });

  cmd
    .command('import-url')
    .description('Import dialect rules from a YAML document or ZIP archive URL')
    .argument('<url>', 'Rule URL')
    .action(async (url: string) => {
      const { rules, logger } = await loadCommandContext();
      reportOutcome(await rules.importUrl(url), url);
      await logger.flush();
    });

  cmd
    .command('import-git')
    .description('Import dialect rules from a git repository')
    .argument('<url>', 'Repository URL')
    .option('-b, --branch <branch>', 'Branch to clone', 'develop')
    .option('-l, --languages <list>', 'Comma-separated language directories')
    .action(async (url: string, opts: { branch: string; languages?: string }) => {
      const { rules, logger } = await loadCommandContext();
      printInfo(`Cloning ${url} (${opts.branch})`);
      reportOutcome(await rules.importGitRepo(url, opts.branch, splitList(opts.languages)), url);
      await logger.flush();
    });

  cmd
    .command('update')
    .description('Replace the rule set from the configured update URL')
    .action(async () => {
      const { rules, logger } = await loadCommandContext();
      const updated = await rules.update();
      await logger.flush();
      if (updated) {
        printSuccess(`Rule set updated: ${rules.ruleCount()} rules`);
      } else {
        printError('Rule update failed; existing rules are unchanged');
        process.exitCode = 1;
      }
    });

  return cmd;
}
