/**
 * Match Command
 * Resolves a build failure text to the first matching regex rule and the
 * cron time that governs its restarts.
 */

import { Command } from 'commander';
import { ExitCode, getErrorMessage, type MatchOptions } from '../types';
import { CLILogger } from '../utils/logger';
import { openStore } from '../utils/store-loader';
import { findMatchingRule, resolveRuleCronTime } from '../../lib/regex-rules';

const logger = new CLILogger();

/**
 * Execute match command
 *
 * @param text - Failure text to match
 */
export function matchCommand(text: string, options: MatchOptions = {}): void {
  try {
    const store = openStore(options.db);
    const rules = store.getRegexRules();
    const rule = findMatchingRule(rules, text);

    if (!rule) {
      console.log('No rule matches');
      process.exit(ExitCode.NO_MATCH);
      return;
    }

    console.log(`Rule:      [${rules.indexOf(rule) + 1}] ${rule.value}`);
    if (rule.description) {
      console.log(`Label:     ${rule.description}`);
    }
    console.log(`Cron time: ${resolveRuleCronTime(rule, store.getCronTime()) || '(not set)'}`);
    process.exit(ExitCode.SUCCESS);
  } catch (error) {
    logger.error(`Failed to match rules: ${getErrorMessage(error)}`);
    process.exit(ExitCode.UNEXPECTED_ERROR);
  }
}

/**
 * Create the match command.
 */
export function createMatchCommand(): Command {
  return new Command('match')
    .description('Find the regex rule that applies to a failure text')
    .argument('<text>', 'Failure text')
    .option('--db <path>', 'Database path (overrides RC_DB_PATH)')
    .action((text: string, options: MatchOptions) => {
      matchCommand(text, options);
    });
}
