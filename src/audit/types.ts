/**
 * Audit Log Types
 */

import { z } from 'zod';
import type { AuditEventType } from '../types.js';

export type { AuditEventType, AuditSink } from '../types.js';

/**
 * A persisted audit record.
 */
export interface AuditEvent {
  /** Unique identifier for this event */
  id: string;
  /** ISO 8601 timestamp when the event was recorded */
  timestamp: string;
  event_type: AuditEventType;
  details: Record<string, unknown>;
}

/**
 * Filters for querying audit events.
 */
export interface AuditEventFilter {
  /** Filter by event type */
  type?: AuditEventType;
  /** Maximum number of events to return (most recent last) */
  limit?: number;
}

export const AUDIT_EVENT_TYPES = [
  'MODEL_INITIALIZED',
  'EXPLAINABILITY_UNAVAILABLE',
  'ATTRIBUTION_FAILED',
  'ATTRIBUTION_VALIDATION_FAILED',
  'EVIDENCE_GENERATED',
  'GENERATION_REFUSED',
  'TEXT_GENERATED',
] as const satisfies readonly AuditEventType[];

export const auditEventSchema: z.ZodType<AuditEvent> = z.object({
  id: z.string(),
  timestamp: z.string(),
  event_type: z.enum(AUDIT_EVENT_TYPES),
  details: z.record(z.unknown()),
});

