/**
 * pricewhy config — View configuration
 */

import chalk from 'chalk';
import { isInitialized, loadConfig, localConfigPath } from '../config.js';
import { DEFAULT_MODEL_PATH } from '../model/linear.js';
import { exitWithError } from './errors.js';

interface ConfigOptions {
  json?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  console.log();

  const config = await loadConfig().catch(exitWithError);

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  console.log(chalk.bold('⚙️  PriceWhy Configuration'));
  console.log(
    chalk.dim(`   ${isInitialized() ? localConfigPath() : '(defaults — run `pricewhy init` to customize)'}`),
  );
  console.log();

  console.log(`  ${chalk.dim('Version:')}         ${config.version}`);
  console.log(`  ${chalk.dim('Product:')}         ${config.productId}`);
  console.log(`  ${chalk.dim('Currency:')}        ${config.currency}`);
  console.log(`  ${chalk.dim('Model:')}           ${config.modelPath ?? chalk.dim(`(bundled) ${DEFAULT_MODEL_PATH}`)}`);
  console.log(`  ${chalk.dim('Audit log:')}       ${config.audit.path}`);
  console.log(`  ${chalk.dim('Safety:')}`);
  console.log(`  ${chalk.dim('  hide costs:')}     ${flag(config.safety.hideExactCosts)}`);
  console.log(`  ${chalk.dim('  hide suppliers:')} ${flag(config.safety.hideSupplierNames)}`);
  if (config.safety.supplierNames.length > 0) {
    console.log(`  ${chalk.dim('  suppliers:')}      ${config.safety.supplierNames.join(', ')}`);
  }
  console.log();
}

function flag(value: boolean): string {
  return value ? chalk.green('on') : chalk.yellow('off');
}
