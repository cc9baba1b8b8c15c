import { Command } from 'commander';
import fs from 'fs';
import { loadConfig, getEnvValue, DEFAULT_CONFIG_FILE, type AppConfig } from '../config/index.js';
import { describe as describeError } from '../core/errors.js';
import type { RunSummary } from '../core/types.js';
import { getDb, openDatabase, type DatabaseClient } from '../db/client.js';
import { AuditRepository } from '../repositories/auditRepository.js';
import { RunStateRepository } from '../repositories/runStateRepository.js';
import { TargetRepository } from '../repositories/targetRepository.js';
import { sweepTempFiles } from '../security/lifecycleGuard.js';
import { buildOrchestrator } from '../services/container.js';
import { toCsv } from '../utils/csv.js';
import { getLogger } from '../utils/logging.js';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

export interface CliDeps {
  io?: CliIo;
  db?: DatabaseClient;
  /** Replaces the production wiring, e.g. with fakes in tests. */
  runner?: (cfg: AppConfig, opts: { dryRun: boolean; signal: AbortSignal }) => Promise<RunSummary>;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

interface Check {
  name: string;
  ok: boolean;
  required: boolean;
  detail?: string;
}

export function buildProgram(deps: CliDeps = {}): Command {
  const io = deps.io ?? consoleIo;
  const program = new Command();

  program
    .name('relay')
    .description('Ephemeral cookie extraction and sealed secret delivery')
    .version('0.1.0')
    .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_FILE)
    .exitOverride();

  const config = () => loadConfig(program.opts<{ config: string }>().config);
  // Opened from the config named by --config, not the default file.
  const db = (cfg: AppConfig = config()) => deps.db ?? getDb(cfg);

  program
    .command('run')
    .description('Run one discovery → extraction → delivery pass')
    .option('--dry-run', 'Seal nothing and upload nothing; log what would be delivered', false)
    .action(async (opts: { dryRun: boolean }) => {
      const cfg = config();
      const controller = new AbortController();
      const onSignal = () => controller.abort(new Error('interrupted'));
      process.once('SIGINT', onSignal);
      try {
        const summary = deps.runner
          ? await deps.runner(cfg, { dryRun: opts.dryRun, signal: controller.signal })
          : await buildOrchestrator(cfg, { dryRun: opts.dryRun, db: db(cfg) }).run({
              signal: controller.signal,
            });
        io.out(
          JSON.stringify(
            {
              runId: summary.runId,
              targetsDiscovered: summary.targetsDiscovered,
              outcomes: summary.outcomes,
            },
            null,
            2,
          ),
        );
      } catch (err) {
        getLogger().error({ err }, 'run failed');
        io.err(`Run failed: ${describeError(err)}`);
        io.setExitCode(1);
      } finally {
        process.removeListener('SIGINT', onSignal);
      }
    });

  program
    .command('state')
    .description('Show the persisted run state')
    .action(async () => {
      const snap = await new RunStateRepository(db()).snapshot();
      io.out(
        JSON.stringify({
          state: snap.state,
          updatedAt: snap.updatedAt ? snap.updatedAt.toISOString() : null,
        }),
      );
    });

  program
    .command('audit')
    .description('Export recent audit records')
    .option('-l, --limit <n>', 'Number of records', '100')
    .option('-f, --format <format>', 'json or csv', 'json')
    .option('-e, --event <type>', 'Only this event type')
    .action(async (opts: { limit: string; format: string; event?: string }) => {
      const limit = parseInt(opts.limit, 10);
      if (Number.isNaN(limit) || limit <= 0) {
        io.err('--limit must be a positive integer');
        io.setExitCode(2);
        return;
      }
      if (opts.format !== 'json' && opts.format !== 'csv') {
        io.err('--format must be json or csv');
        io.setExitCode(2);
        return;
      }
      const records = await new AuditRepository(db()).list({ limit, eventType: opts.event });
      if (opts.format === 'csv') {
        io.out(
          toCsv(records, ['id', 'createdAt', 'eventType', 'targetName', 'platform', 'status', 'message']),
        );
        return;
      }
      io.out(JSON.stringify(records, null, 2));
    });

  program
    .command('targets')
    .description('List discovered targets')
    .option('--requires-cookies', 'Only targets the advisor approved for extraction', false)
    .action(async (opts: { requiresCookies: boolean }) => {
      const list = await new TargetRepository(db()).list(
        opts.requiresCookies ? { requiresCookies: true } : {},
      );
      io.out(JSON.stringify(list, null, 2));
    });

  program
    .command('sweep')
    .description('Remove leftover cookie_* temp files')
    .option('--dir <dir>', 'Directory to sweep (default: OS temp dir)')
    .action((opts: { dir?: string }) => {
      const removed = sweepTempFiles(opts.dir);
      io.out(JSON.stringify({ removed }));
    });

  program
    .command('validate')
    .description('Check configuration and environment before a run')
    .action(() => {
      const checks: Check[] = [];
      let cfg: AppConfig | undefined;
      try {
        cfg = config();
        checks.push({ name: 'config', ok: true, required: true });
      } catch (err) {
        checks.push({ name: 'config', ok: false, required: true, detail: describeError(err) });
      }
      if (cfg) {
        checks.push({ name: 'github.org', ok: cfg.github.org !== '', required: true });
        checks.push({
          name: cfg.github.tokenEnv,
          ok: getEnvValue(cfg.github.tokenEnv) !== undefined,
          required: true,
        });
        checks.push({
          name: cfg.advisor.apiKeyEnv,
          ok: getEnvValue(cfg.advisor.apiKeyEnv) !== undefined,
          required: false,
          detail: 'without it every decision falls back to skip',
        });
        checks.push(databaseCheck(cfg.storage.databasePath));
        if (cfg.browser.executablePath) {
          checks.push({
            name: 'browser.executablePath',
            ok: fs.existsSync(cfg.browser.executablePath),
            required: true,
          });
        }
      }
      for (const c of checks) {
        io.out(`${c.ok ? 'ok  ' : c.required ? 'FAIL' : 'warn'} ${c.name}${c.detail && !c.ok ? ` (${c.detail})` : ''}`);
      }
      if (checks.some((c) => c.required && !c.ok)) io.setExitCode(1);
    });

  return program;
}

function databaseCheck(databasePath: string): Check {
  try {
    openDatabase(databasePath).close();
    return { name: 'database', ok: true, required: true };
  } catch (err) {
    return { name: 'database', ok: false, required: true, detail: describeError(err) };
  }
}
