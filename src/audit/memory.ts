/**
 * In-memory audit sink.
 *
 * Keeps every event in insertion order. Used by tests and by callers that
 * inspect the audit trail of a single run.
 */

import { randomUUID } from 'node:crypto';
import type { AuditEventType, AuditSink } from '../types.js';
import type { AuditEvent, AuditEventFilter } from './types.js';

export class MemoryAuditSink implements AuditSink {
  private events: AuditEvent[] = [];

  logEvent(type: AuditEventType, details: Record<string, unknown>): void {
    this.events.push({
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      event_type: type,
      details,
    });
  }

  /**
   * Query events with filters.
   */
  query(filter?: AuditEventFilter): AuditEvent[] {
    let results = [...this.events];

    if (filter?.type) {
      results = results.filter((e) => e.event_type === filter.type);
    }

    if (filter?.limit !== undefined && filter.limit >= 0) {
      results = results.slice(Math.max(0, results.length - filter.limit));
    }

    return results;
  }

  /** Event types in the order they were logged */
  types(): AuditEventType[] {
    return this.events.map((e) => e.event_type);
  }

  get size(): number {
    return this.events.length;
  }

  clear(): void {
    this.events = [];
  }
}
