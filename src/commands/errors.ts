/**
 * Shared failure exit for command handlers.
 */

import chalk from 'chalk';

export function exitWithError(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.log(chalk.red(`✗ ${message}`));
  console.log();
  process.exit(1);
}
