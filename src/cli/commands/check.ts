/**
 * Check Command
 * Runs the live validation endpoint of a single form field.
 * A regex value that passes the syntax check is also checked for
 * catastrophic backtracking.
 */

import { Command } from 'commander';
import { ExitCode } from '../types';
import { CLILogger } from '../utils/logger';
import { CHECKABLE_FIELDS, isCheckableField } from '../../config/reincarnation-config';
import { checkField, checkRegexSafety } from '../../lib/config-validator';

const logger = new CLILogger();

/**
 * Execute check command
 *
 * @param field - Field name (cronTime, regExValue, regExCronTime)
 * @param value - Field value; an omitted value is checked as an empty field
 */
export function checkCommand(field: string, value?: string): void {
  if (!isCheckableField(field)) {
    logger.error(`Unknown field: ${field} (expected one of: ${CHECKABLE_FIELDS.join(', ')})`);
    process.exit(ExitCode.CONFIG_ERROR);
    return;
  }

  const input = value ?? '';
  let result = checkField(field, input);
  if (field === 'regExValue' && result.kind === 'ok') {
    result = checkRegexSafety(input);
  }
  switch (result.kind) {
    case 'ok':
      logger.success('OK');
      process.exit(ExitCode.SUCCESS);
      return;
    case 'warning':
      logger.warn(result.message);
      process.exit(ExitCode.SUCCESS);
      return;
    case 'error':
      logger.error(result.message);
      process.exit(ExitCode.CONFIG_ERROR);
      return;
  }
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate a single configuration field')
    .argument('<field>', `Field name (${CHECKABLE_FIELDS.join(', ')})`)
    .argument('[value]', 'Field value')
    .action((field: string, value: string | undefined) => {
      checkCommand(field, value);
    });
}
