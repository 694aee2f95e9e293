/**
 * Show Command
 * Prints the current configuration and the values its accessors derive.
 */

import { Command } from 'commander';
import { ExitCode, getErrorMessage, type ShowOptions } from '../types';
import { CLILogger } from '../utils/logger';
import { openStore } from '../utils/store-loader';
import type { ConfigurationStore } from '../../lib/config-store';

const logger = new CLILogger();

const NOT_SET = '(not set)';

/**
 * Print a labelled value, padded so the values line up
 */
function printField(label: string, value: string): void {
  console.log(`${`${label}:`.padEnd(20)}${value}`);
}

function formatFlag(enabled: boolean, raw: string | null): string {
  const state = enabled ? 'enabled' : 'disabled';
  return raw === null ? state : `${state} ("${raw}")`;
}

function printText(store: ConfigurationStore): void {
  console.log('');
  console.log('Reincarnation Configuration');
  console.log('='.repeat(40));

  printField('Cron restart', formatFlag(store.isCronRestartEnabled(), store.getActiveCron()));
  printField('Trigger restart', formatFlag(store.isTriggerRestartEnabled(), store.getActiveTrigger()));
  printField('Restart unchanged', formatFlag(store.isRestartUnchangedEnabled(), store.getNoChange()));
  printField('Cron time', store.getCronTime() || NOT_SET);
  printField('Max retry depth', String(store.getMaxRetryDepth()));

  const rules = store.getRegexRules();
  printField('Regex rules', String(rules.length));
  rules.forEach((rule, index) => {
    const cron = rule.cronTime || '(global)';
    const description = rule.description ? `  # ${rule.description}` : '';
    console.log(`  [${index + 1}] ${rule.value}  cron: ${cron}${description}`);
  });

  console.log('');
}

function printJson(store: ConfigurationStore): void {
  console.log(JSON.stringify({
    ...store.getSnapshot(),
    cronRestartEnabled: store.isCronRestartEnabled(),
    triggerRestartEnabled: store.isTriggerRestartEnabled(),
    restartUnchangedEnabled: store.isRestartUnchangedEnabled(),
    maxRetryDepth: store.getMaxRetryDepth(),
  }, null, 2));
}

/**
 * Execute show command
 */
export function showCommand(options: ShowOptions = {}): void {
  try {
    const store = openStore(options.db);
    if (options.json) {
      printJson(store);
    } else {
      printText(store);
    }
    process.exit(ExitCode.SUCCESS);
  } catch (error) {
    logger.error(`Failed to read configuration: ${getErrorMessage(error)}`);
    process.exit(ExitCode.UNEXPECTED_ERROR);
  }
}

/**
 * Create the show command.
 */
export function createShowCommand(): Command {
  return new Command('show')
    .description('Show the current configuration')
    .option('--json', 'Print as JSON')
    .option('--db <path>', 'Database path (overrides RC_DB_PATH)')
    .action((options: ShowOptions) => {
      showCommand(options);
    });
}
