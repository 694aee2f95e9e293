/**
 * CLI program definition
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import path from 'path';
import { createShowCommand } from './commands/show';
import { createApplyCommand } from './commands/apply';
import { createCheckCommand } from './commands/check';
import { createMatchCommand } from './commands/match';

/**
 * Read the package version (package.json sits two levels above this file
 * both in src/cli and in dist/cli)
 */
function readVersion(): string {
  const pkgPath = path.join(__dirname, '..', '..', 'package.json');
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Build the CLI program with every command registered.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('reincarnation')
    .description('Manage the restart configuration for failed build jobs')
    .version(readVersion());

  program.addCommand(createShowCommand());
  program.addCommand(createApplyCommand());
  program.addCommand(createCheckCommand());
  program.addCommand(createMatchCommand());

  program.addHelpText('after', `
Examples:
  reincarnation check cronTime "0 2 * * *"
  reincarnation apply ./config-form.json
  reincarnation match "OutOfMemoryError: heap space exhausted"
`);

  return program;
}
