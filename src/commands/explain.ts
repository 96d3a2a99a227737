/**
 * pricewhy explain — Render explanations for a saved evidence record
 */

import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import { auditLogPath, loadConfig } from '../config.js';
import { JsonlAuditSink } from '../audit/jsonl.js';
import { parseEvidenceJson } from '../evidence/codec.js';
import { inspectEvidence } from '../evidence/validator.js';
import { generateExplanations } from '../explainability/generate.js';
import { AUDIENCES, type Audience } from '../types.js';
import { exitWithError } from './errors.js';

interface ExplainOptions {
  audience?: string;
  json?: boolean;
}

type AudienceSelection = Audience | 'both';

export async function explainCommand(file: string, options: ExplainOptions): Promise<void> {
  console.log();

  const selection = parseAudience(options.audience);
  const config = await loadConfig().catch(exitWithError);
  const text = await readFile(file, 'utf-8').catch(exitWithError);

  let candidate: unknown;
  try {
    candidate = parseEvidenceJson(text);
  } catch (error) {
    exitWithError(error);
  }

  const sink = new JsonlAuditSink(auditLogPath(config));
  const result = generateExplanations(candidate, sink, {
    supplierNames: config.safety.supplierNames,
  });
  await sink.flush();

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    if (result.status === 'refused') process.exitCode = 1;
    return;
  }

  if (result.status === 'refused') {
    const { reason } = inspectEvidence(candidate);
    console.log(chalk.red(`✗ ${result.error}${reason ? `: ${reason}` : ''}`));
    console.log(chalk.dim(`  ${result.customer_text}`));
    console.log();
    process.exitCode = 1;
    return;
  }

  const sections: Array<[Audience, string]> = [
    ['customer', result.customer_text],
    ['regulator', result.regulator_text],
  ];

  for (const [audience, body] of sections) {
    if (selection !== 'both' && selection !== audience) continue;
    console.log(chalk.bold(audience === 'customer' ? '👩‍💼 Customer Version' : '🧑‍⚖️ Regulator Version'));
    console.log();
    console.log(body);
    console.log();
  }

  if (result.evidence_used) {
    console.log(chalk.dim(`  Evidence: ${result.evidence_used}`));
    console.log();
  }
}

function parseAudience(value: string | undefined): AudienceSelection {
  if (value === undefined || value === 'both') return 'both';
  const match = AUDIENCES.find((audience) => audience === value);
  if (!match) {
    return exitWithError(new Error(`--audience must be customer, regulator or both, got "${value}"`));
  }
  return match;
}
