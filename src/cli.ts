#!/usr/bin/env node

/**
 * PriceWhy CLI
 *
 * Evidence-backed explanations for automated price changes.
 *
 * Usage:
 *   pricewhy init                     Create .pricewhy/config.json
 *   pricewhy config                   View configuration
 *   pricewhy run                      Simulate pricing cycles and explain changes
 *   pricewhy explain <evidence.json>  Render explanations for a saved evidence record
 *   pricewhy audit                    Inspect the audit log
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  initCommand,
  configCommand,
  runCommand,
  explainCommand,
  auditCommand,
} from './commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('pricewhy')
  .description('Evidence-backed explanations for automated price changes.')
  .version(version);

// ─── pricewhy init ───────────────────────────────────────────

program
  .command('init')
  .description('Initialize PriceWhy in the current directory')
  .action(initCommand);

// ─── pricewhy config ─────────────────────────────────────────

program
  .command('config')
  .description('View PriceWhy configuration')
  .option('--json', 'Output as JSON')
  .action(configCommand);

// ─── pricewhy run ────────────────────────────────────────────

program
  .command('run')
  .description('Simulate pricing cycles and explain every material price change')
  .option('-c, --cycles <n>', 'Number of market cycles to simulate', '5')
  .option('-s, --seed <seed>', 'Seed for reproducible market shocks')
  .option('--no-explain', 'Disable the model explainer (change-magnitude attribution)')
  .option('-v, --verbose', 'Echo audit events as they are logged')
  .option('--json', 'Output as JSON')
  .action(runCommand);

// ─── pricewhy explain ────────────────────────────────────────

program
  .command('explain <file>')
  .description('Validate an evidence JSON file and render its explanations')
  .option('-a, --audience <audience>', 'customer, regulator or both', 'both')
  .option('--json', 'Output as JSON')
  .action(explainCommand);

// ─── pricewhy audit ──────────────────────────────────────────

program
  .command('audit')
  .description('Show events from the audit log')
  .option('-t, --type <type>', 'Only show events of this type')
  .option('-n, --limit <n>', 'Show only the most recent n events')
  .option('--json', 'Output as JSON')
  .action(auditCommand);

// ─── Parse & run ─────────────────────────────────────────────

await program.parseAsync();
