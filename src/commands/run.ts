/**
 * pricewhy run — Simulate pricing cycles and explain every material change
 */

import chalk from 'chalk';
import ora from 'ora';
import { auditLogPath, loadConfig, safetyFlagsFor } from '../config.js';
import { JsonlAuditSink } from '../audit/jsonl.js';
import { DEFAULT_MODEL_PATH, loadPricingModel } from '../model/linear.js';
import { MarketSimulator } from '../model/simulator.js';
import { ExplainabilityPipeline, type PipelineCycle } from '../pipeline.js';
import type { AuditEvent } from '../audit/types.js';
import { exitWithError } from './errors.js';

interface RunOptions {
  cycles?: string;
  seed?: string;
  /** false when --no-explain is passed */
  explain?: boolean;
  json?: boolean;
  verbose?: boolean;
}

const DEFAULT_CYCLES = 5;

export async function runCommand(options: RunOptions): Promise<void> {
  console.log();

  const cycles = parseCycles(options.cycles);
  const config = await loadConfig().catch(exitWithError);

  const spinner = ora('Loading pricing model...').start();
  const model = await loadPricingModel(config.modelPath ?? DEFAULT_MODEL_PATH).catch(
    (error: unknown) => {
      spinner.fail('Could not load pricing model');
      return exitWithError(error);
    },
  );
  spinner.succeed(`Loaded model ${chalk.cyan(model.metadata.version)}`);

  const sink = new JsonlAuditSink(auditLogPath(config), {
    onEvent: options.verbose ? printAuditEvent : undefined,
  });

  const pipeline = new ExplainabilityPipeline({
    model,
    sink,
    productId: config.productId,
    currency: config.currency,
    safetyFlags: safetyFlagsFor(config),
    explainability: options.explain !== false,
    supplierNames: config.safety.supplierNames,
  });

  const simulator = new MarketSimulator(model, { seed: options.seed });
  pipeline.process(simulator.current());

  if (!options.json) {
    const modeLabel =
      pipeline.mode === 'explainable' ? chalk.green('explainable (SHAP)') : chalk.yellow('fallback (change magnitude)');
    console.log(chalk.dim(`  Attribution mode: `) + modeLabel);
    console.log(chalk.dim(`  Starting price:   ${simulator.current().price} ${config.currency}`));
  }

  const results: Array<{ cycle: number; shock: string; price: number; result: PipelineCycle | null }> = [];

  for (let cycle = 1; cycle <= cycles; cycle++) {
    const { shock, state } = simulator.step();
    const result = pipeline.process(state);
    results.push({ cycle, shock, price: state.price, result });

    if (!options.json) {
      printCycle(cycle, shock, result);
    }
  }

  await sink.flush();

  if (options.json) {
    console.log(JSON.stringify(results, null, 2));
    return;
  }

  const produced = results.filter((r) => r.result !== null).length;
  console.log();
  console.log(chalk.green(`✓ ${produced} of ${cycles} cycle${cycles === 1 ? '' : 's'} produced evidence`));
  console.log(chalk.dim(`  Audit log: ${sink.path}`));
  if (sink.failedWrites > 0) {
    console.log(chalk.yellow(`  ⚠ ${sink.failedWrites} audit event(s) could not be written`));
  }
  console.log();
}

function parseCycles(value: string | undefined): number {
  if (value === undefined) return DEFAULT_CYCLES;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return exitWithError(new Error(`--cycles must be a positive integer, got "${value}"`));
  }
  return parsed;
}

function printCycle(cycle: number, shock: string, result: PipelineCycle | null): void {
  console.log();
  console.log(chalk.bold(`[Cycle ${cycle}] `) + chalk.dim(`market shock: ${shock}`));

  if (!result) {
    console.log(chalk.dim('  No explainable change detected.'));
    return;
  }

  const { evidence, explanations } = result;
  console.log(
    chalk.cyan(`  Evidence ${evidence.event_id}: `) +
      `${evidence.old_price} → ${evidence.new_price} ${evidence.currency}`,
  );
  console.log(chalk.dim(`  Features: ${evidence.features_used.map((f) => `${f.name}=${f.attribution}`).join(', ')}`));

  if (explanations.status === 'refused') {
    console.log(chalk.red(`  ✗ ${explanations.error}`));
    return;
  }

  console.log();
  console.log(chalk.bold('  Customer version:'));
  console.log(indent(explanations.customer_text));
  console.log();
  console.log(chalk.bold('  Regulator version:'));
  console.log(indent(explanations.regulator_text));
}

function printAuditEvent(event: AuditEvent): void {
  console.log(chalk.dim(`  · audit ${event.event_type}`));
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n');
}
