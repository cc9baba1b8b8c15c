import fs from 'fs';
import os from 'os';
import path from 'path';
import { getLogger } from '../utils/logging.js';
import { artifactsReleasedTotal } from '../metrics/index.js';
import type { SensitiveHolder } from './sensitive.js';

export const TEMP_FILE_PREFIX = 'cookie_';

export interface GuardHandle {
  readonly id: number;
  readonly label: string;
}

export interface LifecycleGuardOptions {
  tempDir?: string;
  tempFilePrefix?: string;
}

/**
 * Scoped ownership of sensitive values for one run.
 *
 * Every value created during a run is tracked here and zero-filled on release.
 * A guard belongs to exactly one run; never share an instance between runs.
 */
export class SecureLifecycleGuard {
  private readonly tracked = new Map<number, { handle: GuardHandle; holder: SensitiveHolder }>();
  private nextId = 1;
  private readonly tempDir: string;
  private readonly tempFilePrefix: string;

  constructor(opts: LifecycleGuardOptions = {}) {
    this.tempDir = opts.tempDir ?? os.tmpdir();
    this.tempFilePrefix = opts.tempFilePrefix ?? TEMP_FILE_PREFIX;
  }

  /** Registers a value for eventual release. The handle cannot read the value back. */
  track(holder: SensitiveHolder, label = 'value'): GuardHandle {
    const handle: GuardHandle = Object.freeze({ id: this.nextId++, label });
    this.tracked.set(handle.id, { handle, holder });
    return handle;
  }

  trackAll(holders: Iterable<SensitiveHolder>, label = 'value'): GuardHandle[] {
    const handles: GuardHandle[] = [];
    for (const h of holders) handles.push(this.track(h, label));
    return handles;
  }

  /** Zero-fills and untracks. Releasing an unknown or already released handle is a no-op. */
  release(handle: GuardHandle): void {
    const entry = this.tracked.get(handle.id);
    if (!entry) return;
    this.tracked.delete(handle.id);
    if (entry.holder.released) return;
    entry.holder.wipe();
    artifactsReleasedTotal.inc({ label: entry.handle.label });
  }

  releaseMany(handles: Iterable<GuardHandle>): void {
    for (const h of handles) this.release(h);
  }

  /**
   * Releases everything still tracked, then asks for collection and sweeps
   * leftover temp files. The last two are advisory and never throw.
   * Returns the number of handles released.
   */
  releaseAll(): number {
    const handles = [...this.tracked.values()].map((e) => e.handle);
    this.releaseMany(handles);
    requestCollection();
    this.sweepTempFiles();
    return handles.length;
  }

  isTracked(handle: GuardHandle): boolean {
    return this.tracked.has(handle.id);
  }

  trackedHandles(): GuardHandle[] {
    return [...this.tracked.values()].map((e) => e.handle);
  }

  get size(): number {
    return this.tracked.size;
  }

  sweepTempFiles(): number {
    return sweepTempFiles(this.tempDir, this.tempFilePrefix);
  }
}

export function requestCollection(): void {
  // Only available when node runs with --expose-gc
  const g = globalThis as typeof globalThis & { gc?: () => void };
  if (typeof g.gc !== 'function') return;
  try {
    g.gc();
  } catch (err) {
    getLogger().debug({ err }, 'gc request failed');
  }
}

/** Removes files in `dir` whose name starts with `prefix`. Returns how many were removed. */
export function sweepTempFiles(dir: string = os.tmpdir(), prefix: string = TEMP_FILE_PREFIX): number {
  let entries: string[];
  try {
    entries = fs.readdirSync(dir);
  } catch (err) {
    getLogger().debug({ err, dir }, 'temp sweep skipped');
    return 0;
  }
  let removed = 0;
  for (const name of entries) {
    if (!name.startsWith(prefix)) continue;
    const full = path.join(dir, name);
    try {
      if (!fs.statSync(full).isFile()) continue;
      fs.unlinkSync(full);
      removed++;
    } catch (err) {
      getLogger().debug({ err, file: full }, 'temp file removal failed');
    }
  }
  if (removed > 0) getLogger().info({ removed, dir }, 'temp files swept');
  return removed;
}
