import { describe, it, expect, beforeEach } from 'vitest';
import type { DatabaseClient } from '../../src/db/client.js';
import { AuditRepository, MAX_MESSAGE_LENGTH } from '../../src/repositories/auditRepository.js';
import { TargetRepository } from '../../src/repositories/targetRepository.js';
import { ExtractionRepository } from '../../src/repositories/extractionRepository.js';
import { RunStateRepository } from '../../src/repositories/runStateRepository.js';
import { SqliteMetadataStore } from '../../src/repositories/metadataStore.js';
import { NotFoundError } from '../../src/repositories/errors.js';
import { freshTestDb } from '../utils/db.js';
import { target } from '../utils/fakes.js';

let db: DatabaseClient;

beforeEach(() => {
  db = freshTestDb();
});

describe('RunStateRepository', () => {
  it('starts Idle and persists transitions', async () => {
    const repo = new RunStateRepository(db);
    expect(await repo.get()).toBe('Idle');
    await repo.set('Extracting');
    const snap = await repo.snapshot();
    expect(snap.state).toBe('Extracting');
    expect(snap.updatedAt).toBeInstanceOf(Date);
  });

  it('reads an unknown stored status as Idle', async () => {
    db.prepare("UPDATE run_state SET status = 'Paused' WHERE id = 1").run();
    const snap = await new RunStateRepository(db).snapshot();
    expect(snap).toEqual({ state: 'Idle', updatedAt: null });
  });
});

describe('AuditRepository', () => {
  it('scrubs and truncates messages', async () => {
    const repo = new AuditRepository(db);
    await repo.record({ eventType: 'extraction', status: 'failed', message: 'Cookie: sid=abc failed' });
    await repo.record({ eventType: 'extraction', status: 'failed', message: 'x'.repeat(800) });
    const [long, scrubbed] = await repo.list();
    expect(scrubbed.message).toBe('Cookie: [REDACTED] failed');
    expect(long.message).toHaveLength(MAX_MESSAGE_LENGTH);
  });

  it('filters by event, target and status, newest first', async () => {
    const repo = new AuditRepository(db);
    await repo.record({ eventType: 'run', status: 'started' });
    await repo.record({ eventType: 'delivery', targetName: 'acme/web', status: 'delivered' });
    await repo.record({ eventType: 'delivery', targetName: 'acme/api', status: 'delivery-failed' });
    await repo.record({ eventType: 'run', status: 'completed' });

    expect((await repo.list()).map((r) => r.status)).toEqual([
      'completed',
      'delivery-failed',
      'delivered',
      'started',
    ]);
    expect((await repo.list({ eventType: 'delivery' })).map((r) => r.targetName)).toEqual([
      'acme/api',
      'acme/web',
    ]);
    expect((await repo.list({ targetName: 'acme/web' })).map((r) => r.status)).toEqual(['delivered']);
    expect((await repo.list({ status: 'started' })).map((r) => r.eventType)).toEqual(['run']);
    expect(await repo.list({ limit: 1 })).toHaveLength(1);
  });
});

describe('TargetRepository', () => {
  it('upserts by name and never clears requiresCookies', async () => {
    const repo = new TargetRepository(db);
    await repo.upsert(target('acme/web', 0.4), true);
    const again = await repo.upsert(target('acme/web', 0.6), false);
    expect(again.relevanceScore).toBe(0.6);
    expect(again.requiresCookies).toBe(true);
    expect(again.url).toBe('https://github.com/acme/web');
    expect(await repo.list()).toHaveLength(1);
  });

  it('lists by relevance and filters on requiresCookies', async () => {
    const repo = new TargetRepository(db);
    await repo.upsert(target('acme/low', 0.1));
    await repo.upsert(target('acme/high', 0.9), true);
    await repo.upsert(target('acme/mid', 0.5));
    expect((await repo.list()).map((t) => t.name)).toEqual(['acme/high', 'acme/mid', 'acme/low']);
    expect((await repo.list({ requiresCookies: true })).map((t) => t.name)).toEqual(['acme/high']);
    expect((await repo.list({ requiresCookies: false })).map((t) => t.name)).toEqual(['acme/mid', 'acme/low']);
  });

  it('throws NotFoundError for an unknown name', async () => {
    await expect(new TargetRepository(db).getByName('acme/missing')).rejects.toThrow(NotFoundError);
  });
});

describe('ExtractionRepository', () => {
  it('records metadata for a known target and lists newest first', async () => {
    const store = new SqliteMetadataStore(db);
    await store.upsertTarget(target('acme/web', 0.5));
    await store.recordExtraction({
      targetName: 'acme/web',
      platform: 'github',
      artifactCount: 0,
      twoFactorDetected: true,
      succeeded: false,
    });
    const expiresAt = new Date('2030-01-01T00:00:00.000Z');
    await store.recordExtraction({
      targetName: 'acme/web',
      platform: 'github',
      artifactCount: 3,
      twoFactorDetected: false,
      succeeded: true,
      expiresAt,
    });

    const [latest, first] = await new ExtractionRepository(db).listRecent('acme/web');
    expect(latest).toMatchObject({ targetName: 'acme/web', artifactCount: 3, succeeded: true, errorMessage: null });
    expect(latest.expiresAt?.toISOString()).toBe('2030-01-01T00:00:00.000Z');
    expect(first).toMatchObject({ twoFactorDetected: true, succeeded: false, expiresAt: null });
  });

  it('rejects an extraction for an unknown target', async () => {
    await expect(
      new ExtractionRepository(db).record({
        targetName: 'acme/missing',
        platform: 'github',
        artifactCount: 0,
        twoFactorDetected: false,
        succeeded: false,
      }),
    ).rejects.toThrow('Target acme/missing not found');
  });
});
