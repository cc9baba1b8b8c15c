import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { buildProgram, type CliDeps, type CliIo } from '../../src/cli/program.js';
import { closeDb, openDatabase, type DatabaseClient } from '../../src/db/client.js';
import type { RunSummary } from '../../src/core/types.js';
import { AuditRepository } from '../../src/repositories/auditRepository.js';
import { RunStateRepository } from '../../src/repositories/runStateRepository.js';
import { TargetRepository } from '../../src/repositories/targetRepository.js';
import { freshTestDb } from '../utils/db.js';
import { target } from '../utils/fakes.js';

interface Captured extends CliIo {
  stdout: string[];
  stderr: string[];
  exitCode?: number;
}

function captureIo(): Captured {
  const io: Captured = {
    stdout: [],
    stderr: [],
    out: (line) => io.stdout.push(line),
    err: (line) => io.stderr.push(line),
    setExitCode: (code) => {
      io.exitCode = code;
    },
  };
  return io;
}

let db: DatabaseClient;
let dir: string;
let io: Captured;

async function cli(args: string[], deps: Omit<CliDeps, 'io' | 'db'> = {}) {
  await buildProgram({ io, db, ...deps }).parseAsync(['node', 'relay', ...args]);
}

function writeConfig(raw: object): string {
  const file = path.join(dir, 'relay.config.json');
  fs.writeFileSync(file, JSON.stringify(raw));
  return file;
}

beforeEach(() => {
  db = freshTestDb();
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-cli-'));
  io = captureIo();
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  delete process.env.RELAY_TEST_TOKEN;
  delete process.env.RELAY_TEST_ADVISOR_KEY;
});

describe('relay state', () => {
  it('prints the persisted state', async () => {
    await new RunStateRepository(db).set('Injecting');
    await cli(['state']);
    const out = JSON.parse(io.stdout[0]);
    expect(out.state).toBe('Injecting');
    expect(typeof out.updatedAt).toBe('string');
  });
});

describe('--config', () => {
  it('reads the database named by storage.databasePath', async () => {
    const dbPath = path.join(dir, 'nested', 'relay.sqlite');
    const seeded = openDatabase(dbPath);
    await new TargetRepository(seeded).upsert(target('acme/configured', 0.7), true);
    seeded.close();
    closeDb();

    const cfgPath = writeConfig({ storage: { databasePath: dbPath } });
    try {
      await buildProgram({ io }).parseAsync(['node', 'relay', '-c', cfgPath, 'targets']);
      await buildProgram({ io }).parseAsync(['node', 'relay', '-c', cfgPath, 'state']);
    } finally {
      closeDb();
    }

    expect(JSON.parse(io.stdout[0]).map((t: { name: string }) => t.name)).toEqual(['acme/configured']);
    expect(JSON.parse(io.stdout[1]).state).toBe('Idle');
  });
});

describe('relay audit', () => {
  beforeEach(async () => {
    const audit = new AuditRepository(db);
    await audit.record({ eventType: 'run', status: 'started' });
    await audit.record({ eventType: 'delivery', targetName: 'acme/web', status: 'delivered', message: 'ok, sealed' });
  });

  it('exports csv with a fixed header', async () => {
    await cli(['audit', '--format', 'csv']);
    const lines = io.stdout[0].split('\n');
    expect(lines[0]).toBe('id,createdAt,eventType,targetName,platform,status,message');
    expect(lines).toHaveLength(3);
    expect(lines[1]).toMatch(/^2,[^,]+,delivery,acme\/web,,delivered,"ok, sealed"$/);
    expect(lines[2]).toMatch(/^1,[^,]+,run,,,started,$/);
  });

  it('filters json output by event type', async () => {
    await cli(['audit', '--event', 'run']);
    const records = JSON.parse(io.stdout[0]);
    expect(records).toHaveLength(1);
    expect(records[0].status).toBe('started');
  });

  it('rejects a non-numeric limit', async () => {
    await cli(['audit', '--limit', 'abc']);
    expect(io.stderr).toEqual(['--limit must be a positive integer']);
    expect(io.exitCode).toBe(2);
    expect(io.stdout).toEqual([]);
  });
});

describe('relay targets', () => {
  it('lists only approved targets with --requires-cookies', async () => {
    const repo = new TargetRepository(db);
    await repo.upsert(target('acme/web', 0.9), true);
    await repo.upsert(target('acme/docs', 0.1));
    await cli(['targets', '--requires-cookies']);
    const list = JSON.parse(io.stdout[0]);
    expect(list.map((t: { name: string }) => t.name)).toEqual(['acme/web']);
  });
});

describe('relay run', () => {
  const summary: RunSummary = {
    runId: 'run-1',
    startedAt: new Date('2024-05-01T00:00:00.000Z'),
    finishedAt: new Date('2024-05-01T00:01:00.000Z'),
    targetsDiscovered: 1,
    outcomes: [{ target: 'acme/web', platform: 'github', status: 'delivered', artifactCount: 2 }],
  };

  it('prints the run summary and passes --dry-run through', async () => {
    const calls: boolean[] = [];
    await cli(['-c', writeConfig({ github: { org: 'acme' } }), 'run', '--dry-run'], {
      runner: async (_cfg, opts) => {
        calls.push(opts.dryRun);
        return summary;
      },
    });
    expect(calls).toEqual([true]);
    expect(JSON.parse(io.stdout[0])).toEqual({
      runId: 'run-1',
      targetsDiscovered: 1,
      outcomes: [{ target: 'acme/web', platform: 'github', status: 'delivered', artifactCount: 2 }],
    });
    expect(io.exitCode).toBeUndefined();
  });

  it('reports a fatal run error with exit code 1', async () => {
    await cli(['-c', writeConfig({ github: { org: 'acme' } }), 'run'], {
      runner: async () => {
        throw new Error('discovery unavailable');
      },
    });
    expect(io.stderr).toEqual(['Run failed: discovery unavailable']);
    expect(io.exitCode).toBe(1);
  });

  it('fails before running when the organisation is missing', async () => {
    await cli(['-c', writeConfig({ github: { org: '' } }), 'run']);
    expect(io.stderr).toEqual(['Run failed: github.org (GITHUB_ORG) is required']);
    expect(io.exitCode).toBe(1);
  });
});

describe('relay sweep', () => {
  it('removes only cookie_ temp files', async () => {
    fs.writeFileSync(path.join(dir, 'cookie_a.json'), '{}');
    fs.writeFileSync(path.join(dir, 'cookie_b.json'), '{}');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'keep');
    await cli(['sweep', '--dir', dir]);
    expect(io.stdout).toEqual(['{"removed":2}']);
    expect(fs.readdirSync(dir)).toEqual(['notes.txt']);
  });
});

describe('relay validate', () => {
  const raw = {
    github: { org: 'acme', tokenEnv: 'RELAY_TEST_TOKEN' },
    advisor: { apiKeyEnv: 'RELAY_TEST_ADVISOR_KEY' },
    storage: { databasePath: ':memory:' },
  };

  it('passes with a warning when only the advisor key is missing', async () => {
    process.env.RELAY_TEST_TOKEN = 'test-token';
    await cli(['-c', writeConfig(raw), 'validate']);
    expect(io.stdout).toEqual([
      'ok   config',
      'ok   github.org',
      'ok   RELAY_TEST_TOKEN',
      'warn RELAY_TEST_ADVISOR_KEY (without it every decision falls back to skip)',
      'ok   database',
    ]);
    expect(io.exitCode).toBeUndefined();
  });

  it('fails when the delivery token is missing', async () => {
    process.env.RELAY_TEST_ADVISOR_KEY = 'test-key';
    await cli(['-c', writeConfig(raw), 'validate']);
    expect(io.stdout).toContain('FAIL RELAY_TEST_TOKEN');
    expect(io.stdout).toContain('ok   RELAY_TEST_ADVISOR_KEY');
    expect(io.exitCode).toBe(1);
  });

  it('fails on a config file that is not JSON', async () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{');
    await cli(['-c', file, 'validate']);
    expect(io.stdout).toHaveLength(1);
    expect(io.stdout[0]).toMatch(/^FAIL config \(Failed to parse config file /);
    expect(io.exitCode).toBe(1);
  });
});
