/**
 * pricewhy audit — Inspect the audit log
 */

import chalk from 'chalk';
import { auditLogPath, loadConfig } from '../config.js';
import { JsonlAuditSink } from '../audit/jsonl.js';
import { AUDIT_EVENT_TYPES, type AuditEventType } from '../audit/types.js';
import { exitWithError } from './errors.js';

interface AuditOptions {
  type?: string;
  limit?: string;
  json?: boolean;
}

export async function auditCommand(options: AuditOptions): Promise<void> {
  console.log();

  const config = await loadConfig().catch(exitWithError);
  const type = parseType(options.type);
  const limit = options.limit !== undefined ? Number.parseInt(options.limit, 10) : undefined;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    exitWithError(new Error(`--limit must be a non-negative integer, got "${options.limit}"`));
  }

  const sink = new JsonlAuditSink(auditLogPath(config));
  const events = await sink.readAll({ type, limit }).catch(exitWithError);

  if (options.json) {
    console.log(JSON.stringify(events, null, 2));
    return;
  }

  console.log(chalk.bold('🧾 Audit Log'));
  console.log(chalk.dim(`   ${sink.path}`));
  console.log();

  if (events.length === 0) {
    console.log(chalk.dim('  No audit events recorded.'));
    console.log();
    return;
  }

  const typeWidth = Math.max(10, ...events.map((event) => event.event_type.length));

  for (const event of events) {
    console.log(
      `  ${chalk.cyan(event.timestamp)}  ${chalk.yellow(event.event_type.padEnd(typeWidth))}  ${chalk.dim(summarize(event.details))}`,
    );
  }
  console.log();
  console.log(chalk.dim(`   ${events.length} event${events.length === 1 ? '' : 's'}`));
  console.log();
}

function parseType(value: string | undefined): AuditEventType | undefined {
  if (value === undefined) return undefined;
  const match = AUDIT_EVENT_TYPES.find((type) => type === value.toUpperCase());
  if (!match) {
    return exitWithError(new Error(`Unknown event type "${value}". Expected one of: ${AUDIT_EVENT_TYPES.join(', ')}`));
  }
  return match;
}

function summarize(details: Record<string, unknown>): string {
  if (typeof details.reason === 'string') return details.reason;
  if (typeof details.event_id === 'string') return `event ${details.event_id}`;
  if (typeof details.evidence_used === 'string') return `evidence ${details.evidence_used}`;
  if (typeof details.model_version === 'string') return `model ${details.model_version}`;
  return '';
}
