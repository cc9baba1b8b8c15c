import { getDb, type DatabaseClient } from '../db/client.js';
import { NotFoundError, RepositoryError } from './errors.js';
import type { ExtractionMetadata } from '../collaborators/types.js';
import type { ExtractionRecord } from '../core/types.js';

interface RowShape {
  id: number;
  target_name: string;
  platform: string;
  artifact_count: number;
  two_factor_detected: number;
  succeeded: number;
  error_message: string | null;
  extracted_at: string;
  expires_at: string | null;
}

function map(row: RowShape): ExtractionRecord {
  return {
    id: row.id,
    targetName: row.target_name,
    platform: row.platform,
    artifactCount: row.artifact_count,
    twoFactorDetected: row.two_factor_detected === 1,
    succeeded: row.succeeded === 1,
    errorMessage: row.error_message,
    extractedAt: new Date(row.extracted_at),
    expiresAt: row.expires_at ? new Date(row.expires_at) : null,
  };
}

export class ExtractionRepository {
  constructor(private db: DatabaseClient = getDb()) {}

  /** The target row must exist (TargetRepository.upsert runs at discovery). */
  async record(meta: ExtractionMetadata): Promise<ExtractionRecord> {
    const extractedAt = new Date();
    try {
      const target = this.db
        .prepare<unknown[], { id: number }>('SELECT id FROM targets WHERE name = ?')
        .get(meta.targetName);
      if (!target) throw new NotFoundError(`Target ${meta.targetName} not found`);
      const info = this.db
        .prepare(
          `INSERT INTO extractions
             (target_id, platform, artifact_count, two_factor_detected, succeeded, error_message, extracted_at, expires_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          target.id,
          meta.platform,
          meta.artifactCount,
          meta.twoFactorDetected ? 1 : 0,
          meta.succeeded ? 1 : 0,
          meta.errorMessage ?? null,
          extractedAt.toISOString(),
          meta.expiresAt ? meta.expiresAt.toISOString() : null,
        );
      return {
        id: Number(info.lastInsertRowid),
        targetName: meta.targetName,
        platform: meta.platform,
        artifactCount: meta.artifactCount,
        twoFactorDetected: meta.twoFactorDetected,
        succeeded: meta.succeeded,
        errorMessage: meta.errorMessage ?? null,
        extractedAt,
        expiresAt: meta.expiresAt ?? null,
      };
    } catch (err) {
      if (err instanceof NotFoundError) throw err;
      throw new RepositoryError(`Failed to record extraction for ${meta.targetName}`, err);
    }
  }

  async listRecent(targetName: string, limit = 10): Promise<ExtractionRecord[]> {
    try {
      const rows = this.db
        .prepare<unknown[], RowShape>(
          `SELECT e.*, t.name AS target_name FROM extractions e
           JOIN targets t ON t.id = e.target_id
           WHERE t.name = ?
           ORDER BY e.id DESC LIMIT ?`,
        )
        .all(targetName, limit);
      return rows.map(map);
    } catch (err) {
      throw new RepositoryError(`Failed to list extractions for ${targetName}`, err);
    }
  }
}
