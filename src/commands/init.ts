/**
 * pricewhy init — Initialize PriceWhy in the current directory
 */

import chalk from 'chalk';
import ora from 'ora';
import { isInitialized, initializeProject, localConfigDir } from '../config.js';

export async function initCommand(): Promise<void> {
  console.log();
  console.log(chalk.bold('⚡ PriceWhy — Evidence-backed price change explanations'));
  console.log();

  if (isInitialized()) {
    console.log(chalk.yellow('⚠  PriceWhy is already initialized in this directory.'));
    console.log(chalk.dim(`   Config: ${localConfigDir()}/config.json`));
    return;
  }

  const spinner = ora('Initializing PriceWhy...').start();
  const config = await initializeProject();
  spinner.succeed('Created .pricewhy/ directory');

  console.log();
  console.log(chalk.green('✓ PriceWhy initialized!'));
  console.log(chalk.dim(`  Product:  ${config.productId} (${config.currency})`));
  console.log(chalk.dim(`  Audit log: ${config.audit.path}`));
  console.log();
  console.log(chalk.dim('  Next steps:'));
  console.log(chalk.dim(`  ${chalk.white('pricewhy run')}            Simulate pricing cycles and explain changes`));
  console.log(chalk.dim(`  ${chalk.white('pricewhy explain <file>')} Explain a saved evidence record`));
  console.log(chalk.dim(`  ${chalk.white('pricewhy audit')}          Inspect the audit log`));
  console.log();
}
