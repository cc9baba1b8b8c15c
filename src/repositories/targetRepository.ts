import { getDb, type DatabaseClient } from '../db/client.js';
import { NotFoundError, RepositoryError } from './errors.js';
import type { Target, TargetRecord } from '../core/types.js';

interface RowShape {
  id: number;
  name: string;
  url: string;
  relevance_score: number;
  requires_cookies: number;
  last_scanned_at: string | null;
}

const ORDER = 'ORDER BY relevance_score DESC, name';

function map(row: RowShape): TargetRecord {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    relevanceScore: row.relevance_score,
    requiresCookies: row.requires_cookies === 1,
    lastScannedAt: row.last_scanned_at ? new Date(row.last_scanned_at) : null,
  };
}

export class TargetRepository {
  constructor(private db: DatabaseClient = getDb()) {}

  async upsert(target: Target, requiresCookies = false): Promise<TargetRecord> {
    try {
      const row = this.db
        .prepare<unknown[], RowShape>(
          `INSERT INTO targets (name, url, relevance_score, requires_cookies, last_scanned_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(name) DO UPDATE SET
             url = excluded.url,
             relevance_score = excluded.relevance_score,
             requires_cookies = MAX(targets.requires_cookies, excluded.requires_cookies),
             last_scanned_at = excluded.last_scanned_at
           RETURNING *`,
        )
        .get(
          target.identifier,
          target.locator,
          target.relevanceScore,
          requiresCookies ? 1 : 0,
          new Date().toISOString(),
        );
      if (!row) throw new Error('upsert returned no row');
      return map(row);
    } catch (err) {
      throw new RepositoryError(`Failed to upsert target ${target.identifier}`, err);
    }
  }

  async getByName(name: string): Promise<TargetRecord> {
    let row: RowShape | undefined;
    try {
      row = this.db.prepare<unknown[], RowShape>('SELECT * FROM targets WHERE name = ?').get(name);
    } catch (err) {
      throw new RepositoryError(`Failed to get target ${name}`, err);
    }
    if (!row) throw new NotFoundError(`Target ${name} not found`);
    return map(row);
  }

  async list(filter: { requiresCookies?: boolean } = {}): Promise<TargetRecord[]> {
    try {
      const rows =
        filter.requiresCookies === undefined
          ? this.db.prepare<unknown[], RowShape>(`SELECT * FROM targets ${ORDER}`).all()
          : this.db
              .prepare<unknown[], RowShape>(`SELECT * FROM targets WHERE requires_cookies = ? ${ORDER}`)
              .all(filter.requiresCookies ? 1 : 0);
      return rows.map(map);
    } catch (err) {
      throw new RepositoryError('Failed to list targets', err);
    }
  }
}
