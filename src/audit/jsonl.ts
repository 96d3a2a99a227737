/**
 * Append-only JSONL audit log.
 *
 * One JSON object per line. Writes are chained so lines land in the order
 * events were logged, without the caller awaiting anything.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import chalk from 'chalk';
import type { AuditEventType, AuditSink } from '../types.js';
import { auditEventSchema, type AuditEvent, type AuditEventFilter } from './types.js';

export interface JsonlAuditSinkOptions {
  /** Called for every event after it is queued */
  onEvent?: (event: AuditEvent) => void;
  /** Called when a write fails; defaults to a warning on stderr */
  onError?: (error: unknown, event: AuditEvent) => void;
}

export class JsonlAuditSink implements AuditSink {
  private pending: Promise<void> = Promise.resolve();
  private dirReady = false;
  private failed = 0;
  private readonly onEvent?: (event: AuditEvent) => void;
  private readonly onError: (error: unknown, event: AuditEvent) => void;

  constructor(
    readonly path: string,
    options?: JsonlAuditSinkOptions,
  ) {
    this.onEvent = options?.onEvent;
    this.onError = options?.onError ?? defaultErrorReporter;
  }

  logEvent(type: AuditEventType, details: Record<string, unknown>): void {
    const event: AuditEvent = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      event_type: type,
      details,
    };

    const line = `${JSON.stringify(event)}\n`;
    this.pending = this.pending
      .then(() => this.write(line))
      .catch((error: unknown) => {
        this.failed += 1;
        this.onError(error, event);
      });

    this.onEvent?.(event);
  }

  /**
   * Wait until every queued event has been written (or has failed).
   */
  async flush(): Promise<void> {
    await this.pending;
  }

  /** Number of events that could not be written */
  get failedWrites(): number {
    return this.failed;
  }

  /**
   * Read events back from the log file.
   */
  async readAll(filter?: AuditEventFilter): Promise<AuditEvent[]> {
    await this.flush();
    if (!existsSync(this.path)) {
      return [];
    }

    const raw = await readFile(this.path, 'utf-8');
    let events: AuditEvent[] = [];
    raw.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      const parsed = auditEventSchema.safeParse(JSON.parse(line));
      if (!parsed.success) {
        throw new Error(`Malformed audit event on line ${index + 1} of ${this.path}`);
      }
      events.push(parsed.data);
    });

    if (filter?.type) {
      events = events.filter((e) => e.event_type === filter.type);
    }
    if (filter?.limit !== undefined && filter.limit >= 0) {
      events = events.slice(Math.max(0, events.length - filter.limit));
    }
    return events;
  }

  private async write(line: string): Promise<void> {
    if (!this.dirReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.path, line, 'utf-8');
  }
}

function defaultErrorReporter(error: unknown, event: AuditEvent): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.yellow(`⚠ Audit write failed for ${event.event_type}: ${message}`));
}
