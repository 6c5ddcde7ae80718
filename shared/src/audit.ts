import type { RemovalErrorKind } from './enums.js';

// One removal attempt. Append-only; never carries credential material.
export interface AuditEntry {
  logId: string;
  timestamp: string;
  actingUserId: string;
  targetFollowerId: string;
  succeeded: boolean;
  errorKind?: RemovalErrorKind;
  requestId?: string;
}
