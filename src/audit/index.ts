/**
 * PriceWhy Audit Log
 *
 * Sinks for the structured audit trail the pipeline emits.
 */

export { MemoryAuditSink } from './memory.js';
export { JsonlAuditSink, type JsonlAuditSinkOptions } from './jsonl.js';
export type {
  AuditEvent,
  AuditEventFilter,
  AuditEventType,
  AuditSink,
} from './types.js';
export { AUDIT_EVENT_TYPES, auditEventSchema } from './types.js';
