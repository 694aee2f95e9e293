/**
 * Apply Command
 * Applies a configuration form submission read from a JSON file.
 *
 * Field warnings and errors are reported but do not block the save;
 * only a payload that cannot be bound is rejected.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { ExitCode, getErrorMessage, type ApplyOptions } from '../types';
import { CLILogger } from '../utils/logger';
import { openStore } from '../utils/store-loader';
import { bindSubmission } from '../../lib/form-binding';
import { hasErrors, validateSubmission, type FieldValidation } from '../../lib/config-validator';
import { ErrorCode, wrapError } from '../../lib/errors';

/**
 * Label a validated field the way the form names it
 */
export function formatFieldLabel(validation: FieldValidation): string {
  switch (validation.field) {
    case 'cronTime':
      return 'cronTime';
    case 'regExValue':
      return `regExprs[${validation.index ?? 0}].value`;
    case 'regExCronTime':
      return `regExprs[${validation.index ?? 0}].cronTime`;
  }
}

/**
 * Print every non-ok field validation
 */
function reportValidations(logger: CLILogger, validations: FieldValidation[]): void {
  for (const validation of validations) {
    const { result } = validation;
    if (result.kind === 'warning') {
      logger.warn(`${formatFieldLabel(validation)}: ${result.message}`);
    } else if (result.kind === 'error') {
      logger.error(`${formatFieldLabel(validation)}: ${result.message}`);
    }
  }
}

/**
 * Read and parse a JSON form payload.
 *
 * @throws AppError (FILESYSTEM_ERROR) when the file cannot be read
 * @throws AppError (INVALID_FORM) when the file is not valid JSON
 */
export function readPayload(file: string): unknown {
  let text: string;
  try {
    text = readFileSync(file, 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCode.FILESYSTEM_ERROR);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw wrapError(error, ErrorCode.INVALID_FORM);
  }
}

/**
 * Execute apply command
 *
 * @param file - Path to the JSON form payload
 */
export function applyCommand(file: string, options: ApplyOptions = {}): void {
  const logger = new CLILogger({ verbose: options.verbose });
  let payload: unknown;
  try {
    payload = readPayload(file);
  } catch (error) {
    const { code, message } = wrapError(error).toClientError();
    logger.error(`Cannot read form payload ${file}: ${message}`);
    logger.debug(`Error code: ${code}`);
    process.exit(ExitCode.CONFIG_ERROR);
    return;
  }

  const bound = bindSubmission(payload);
  if (!bound.success) {
    logger.error(`Invalid form payload: ${bound.error}`);
    process.exit(ExitCode.CONFIG_ERROR);
    return;
  }

  logger.info(`Read ${bound.form.regExprs.length} regex rule(s) from ${file}`);
  const validations = validateSubmission(bound.form);
  reportValidations(logger, validations);
  if (hasErrors(validations)) {
    logger.warn('Saving configuration with invalid fields');
  }

  try {
    const store = openStore(options.db);
    const result = store.applySubmission(payload);
    if (!result.success) {
      logger.error(`Invalid form payload: ${result.error}`);
      process.exit(ExitCode.CONFIG_ERROR);
      return;
    }
    logger.success('Configuration saved');
    process.exit(ExitCode.SUCCESS);
  } catch (error) {
    logger.error(`Failed to save configuration: ${getErrorMessage(error)}`);
    process.exit(ExitCode.UNEXPECTED_ERROR);
  }
}

/**
 * Create the apply command.
 */
export function createApplyCommand(): Command {
  return new Command('apply')
    .description('Apply a configuration form submission from a JSON file')
    .argument('<file>', 'JSON file with the form payload')
    .option('--db <path>', 'Database path (overrides RC_DB_PATH)')
    .option('-v, --verbose', 'Print debug output')
    .action((file: string, options: ApplyOptions) => {
      applyCommand(file, options);
    });
}
