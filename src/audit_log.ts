/**
 * Audit Log: one JSON line per trust decision.
 *
 * Written to stdout so the Action log (or any collector) keeps the trail.
 * Nothing is persisted locally.
 *
 * NEVER put the token, the hashed bearer value, or a resolved hardware token
 * into an entry. Server host, scope, status and checksums are fine.
 */

export type AuditEvent =
  | 'PROBE_TRUSTED'
  | 'PROBE_UNTRUSTED'
  | 'BOOTSTRAP_VERIFIED'
  | 'BOOTSTRAP_EMPTY'
  | 'BOOTSTRAP_FAILED'
  | 'FETCH_OK'
  | 'FETCH_HARDWARE'
  | 'FETCH_FAILED'
  | 'CLIENT_SECRET_UPDATED';

export interface AuditEntry {
  event: AuditEvent;
  [field: string]: unknown;
}

export type AuditSink = (entry: AuditEntry) => void;

export function emitAuditLog(entry: AuditEntry): void {
  process.stdout.write(JSON.stringify({ ...entry, timestamp: new Date().toISOString() }) + '\n');
}
