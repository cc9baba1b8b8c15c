import { getDb, type DatabaseClient } from '../db/client.js';
import { RepositoryError } from './errors.js';
import type { AuditSink } from '../collaborators/types.js';
import { AUDIT_STATUSES, type AuditRecord, type AuditStatus, type StoredAuditRecord } from '../core/types.js';
import { redactText } from '../utils/redaction.js';

export const MAX_MESSAGE_LENGTH = 500;

interface RowShape {
  id: number;
  event_type: string;
  target_name: string | null;
  platform: string | null;
  status: string;
  message: string | null;
  created_at: string;
}

function toStatus(value: string): AuditStatus {
  return AUDIT_STATUSES.find((s) => s === value) ?? 'failed';
}

function map(row: RowShape): StoredAuditRecord {
  return {
    id: row.id,
    eventType: row.event_type,
    targetName: row.target_name ?? undefined,
    platform: row.platform ?? undefined,
    status: toStatus(row.status),
    message: row.message ?? undefined,
    createdAt: new Date(row.created_at),
  };
}

export interface AuditQuery {
  limit?: number;
  eventType?: string;
  targetName?: string;
  status?: AuditStatus;
}

export class AuditRepository implements AuditSink {
  constructor(private db: DatabaseClient = getDb()) {}

  // Messages are scrubbed and truncated before they are written.
  async record(rec: AuditRecord): Promise<void> {
    const message = rec.message ? redactText(rec.message).slice(0, MAX_MESSAGE_LENGTH) : null;
    try {
      this.db
        .prepare<unknown[], RowShape>(
          `INSERT INTO audit_log (event_type, target_name, platform, status, message, created_at)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          rec.eventType,
          rec.targetName ?? null,
          rec.platform ?? null,
          rec.status,
          message,
          new Date().toISOString(),
        );
    } catch (err) {
      throw new RepositoryError(`Failed to record audit event ${rec.eventType}`, err);
    }
  }

  async list(query: AuditQuery = {}): Promise<StoredAuditRecord[]> {
    const where: string[] = [];
    const params: Array<string | number> = [];
    if (query.eventType) {
      where.push('event_type = ?');
      params.push(query.eventType);
    }
    if (query.targetName) {
      where.push('target_name = ?');
      params.push(query.targetName);
    }
    if (query.status) {
      where.push('status = ?');
      params.push(query.status);
    }
    const sql = `SELECT * FROM audit_log ${where.length ? `WHERE ${where.join(' AND ')}` : ''}
                 ORDER BY id DESC LIMIT ?`;
    params.push(query.limit ?? 100);
    try {
      const rows = this.db.prepare<unknown[], RowShape>(sql).all(...params);
      return rows.map(map);
    } catch (err) {
      throw new RepositoryError('Failed to list audit events', err);
    }
  }
}
