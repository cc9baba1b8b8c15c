import { execFile } from 'child_process';
import { promisify } from 'util';
import { getLogger } from '../utils/logging.js';
import { sleep, withRetry, type RetryOptions } from '../utils/retry.js';
import type { NetworkIdentity } from './types.js';

const execFileAsync = promisify(execFile);

export type CommandRunner = (command: string, args: string[]) => Promise<{ stdout: string }>;

export const defaultRunner: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { encoding: 'utf8' });
  return { stdout };
};

export interface IdentityStatus {
  connected: boolean;
  ip: string | null;
}

export function parseStatus(stdout: string): IdentityStatus {
  const connected = /\bconnected\b/i.test(stdout);
  let ip: string | null = null;
  for (const line of stdout.split(/\r?\n/)) {
    const idx = line.indexOf(':');
    if (idx >= 0 && /\bip(v[46])?\b/i.test(line.slice(0, idx))) {
      ip = line.slice(idx + 1).trim() || null;
      break;
    }
  }
  return { connected, ip };
}

export interface WarpIdentityOptions {
  command?: string;
  connectTimeoutMs?: number;
  settleMs?: number;
  pollMs?: number;
  retry?: RetryOptions;
  runner?: CommandRunner;
}

/** Rotates the egress address by cycling the WARP client: disconnect, settle, connect. */
export class WarpIdentity implements NetworkIdentity {
  private readonly command: string;
  private readonly run: CommandRunner;

  constructor(private readonly opts: WarpIdentityOptions = {}) {
    this.command = opts.command ?? 'warp-cli';
    this.run = opts.runner ?? defaultRunner;
  }

  async rotate(): Promise<void> {
    await this.disconnect();
    await sleep(this.opts.settleMs ?? 2000);
    await this.connect();
    const status = await this.status();
    getLogger().info({ ip: status.ip }, 'network identity rotated');
  }

  disconnect(): Promise<void> {
    return withRetry(async () => {
      await this.run(this.command, ['disconnect']);
    }, this.retryOptions('disconnect'));
  }

  connect(): Promise<void> {
    return withRetry(async () => {
      await this.run(this.command, ['connect']);
      await this.waitForConnection();
    }, this.retryOptions('connect'));
  }

  async status(): Promise<IdentityStatus> {
    try {
      const { stdout } = await this.run(this.command, ['status']);
      return parseStatus(stdout);
    } catch (err) {
      getLogger().debug({ err }, 'identity status query failed');
      return { connected: false, ip: null };
    }
  }

  private async waitForConnection(): Promise<void> {
    const deadline = Date.now() + (this.opts.connectTimeoutMs ?? 30000);
    const poll = this.opts.pollMs ?? 2000;
    while (Date.now() < deadline) {
      if ((await this.status()).connected) return;
      await sleep(poll);
    }
    throw new Error('WARP connection timed out');
  }

  private retryOptions(op: string): RetryOptions {
    return {
      attempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 8000,
      ...this.opts.retry,
      onRetry: (err, attempt, delayMs) =>
        getLogger().warn({ err, op, attempt, delayMs }, 'identity command failed, retrying'),
    };
  }
}
