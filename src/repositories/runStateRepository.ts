import { getDb, type DatabaseClient } from '../db/client.js';
import { RepositoryError } from './errors.js';
import type { RunStateStore } from '../collaborators/types.js';
import type { RunState } from '../core/types.js';
import { isRunState } from '../services/runStateMachine.js';

interface RowShape {
  status: string;
  updated_at: string;
}

export class RunStateRepository implements RunStateStore {
  constructor(private db: DatabaseClient = getDb()) {}

  async get(): Promise<RunState> {
    return (await this.snapshot()).state;
  }

  async snapshot(): Promise<{ state: RunState; updatedAt: Date | null }> {
    let row: RowShape | undefined;
    try {
      row = this.db
        .prepare<unknown[], RowShape>('SELECT status, updated_at FROM run_state WHERE id = 1')
        .get();
    } catch (err) {
      throw new RepositoryError('Failed to read run state', err);
    }
    // Unknown or missing values read as Idle: nothing resumes from persisted state.
    if (!row || !isRunState(row.status)) return { state: 'Idle', updatedAt: null };
    return { state: row.status, updatedAt: new Date(row.updated_at) };
  }

  async set(state: RunState): Promise<void> {
    try {
      this.db
        .prepare<unknown[], RowShape>(
          `INSERT INTO run_state (id, status, updated_at) VALUES (1, ?, ?)
           ON CONFLICT(id) DO UPDATE SET status = excluded.status, updated_at = excluded.updated_at`,
        )
        .run(state, new Date().toISOString());
    } catch (err) {
      throw new RepositoryError(`Failed to persist run state ${state}`, err);
    }
  }
}
