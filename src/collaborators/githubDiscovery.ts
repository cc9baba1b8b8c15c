import { z } from 'zod';
import type { Target } from '../core/types.js';
import { githubHeaders } from '../delivery/secretStore.js';
import { HttpError, requestJson } from '../utils/http.js';
import { getLogger } from '../utils/logging.js';
import type { TargetDiscovery } from './types.js';

const RepoSchema = z.object({
  full_name: z.string().min(1),
  html_url: z.string().url(),
  stargazers_count: z.number().nonnegative().default(0),
  archived: z.boolean().default(false),
  description: z.string().nullable().default(null),
});

const ContentItemSchema = z.object({
  type: z.string(),
  name: z.string(),
});

export const SCORED_EXTENSIONS: readonly string[] = ['.env', '.yaml', '.yml', '.json', '.py', '.js'];

/**
 * 0.1 per top-level config-ish file, plus stars/1000 capped at 0.5.
 * The total is capped at 1.
 */
export function scoreRepository(
  rootEntries: ReadonlyArray<{ type: string; name: string }>,
  stars: number,
): number {
  let score = 0;
  for (const entry of rootEntries) {
    if (entry.type === 'file' && SCORED_EXTENSIONS.some((ext) => entry.name.endsWith(ext))) {
      score += 0.1;
    }
  }
  score += Math.min(stars / 1000, 0.5);
  return Math.min(Math.round(score * 1000) / 1000, 1);
}

export interface GitHubDiscoveryOptions {
  apiUrl: string;
  org: string;
  token?: string;
  timeoutMs?: number;
  /** Upper bound on pages of 100 repositories. */
  maxPages?: number;
}

/** Lists an organisation's repositories and keeps those with a positive score. */
export class GitHubDiscovery implements TargetDiscovery {
  private readonly apiUrl: string;

  constructor(private readonly opts: GitHubDiscoveryOptions) {
    this.apiUrl = opts.apiUrl.replace(/\/+$/, '');
  }

  async discover(): Promise<Target[]> {
    const repos = await this.listRepositories();
    const targets: Target[] = [];
    for (const repo of repos) {
      if (repo.archived) continue;
      const entries = await this.rootEntries(repo.full_name);
      const relevanceScore = scoreRepository(entries, repo.stargazers_count);
      if (relevanceScore <= 0) continue;
      targets.push(
        Object.freeze({
          identifier: repo.full_name,
          locator: repo.html_url,
          relevanceScore,
          ...(repo.description ? { description: repo.description } : {}),
        }),
      );
    }
    targets.sort((a, b) => b.relevanceScore - a.relevanceScore);
    getLogger().info({ org: this.opts.org, scanned: repos.length, kept: targets.length }, 'discovery complete');
    return targets;
  }

  private async listRepositories(): Promise<Array<z.infer<typeof RepoSchema>>> {
    const maxPages = this.opts.maxPages ?? 10;
    const out: Array<z.infer<typeof RepoSchema>> = [];
    for (let page = 1; page <= maxPages; page++) {
      const url = `${this.apiUrl}/orgs/${encodeURIComponent(this.opts.org)}/repos?per_page=100&page=${page}`;
      const body = await requestJson(url, {
        headers: githubHeaders(this.opts.token),
        timeoutMs: this.opts.timeoutMs,
      });
      const parsed = z.array(RepoSchema).safeParse(body);
      if (!parsed.success) throw new Error(`unexpected repository listing from ${url}`);
      out.push(...parsed.data);
      if (parsed.data.length < 100) break;
    }
    return out;
  }

  // Empty repositories answer 404 on /contents; they score on stars alone.
  private async rootEntries(fullName: string): Promise<Array<{ type: string; name: string }>> {
    try {
      const body = await requestJson(`${this.apiUrl}/repos/${fullName}/contents/`, {
        headers: githubHeaders(this.opts.token),
        timeoutMs: this.opts.timeoutMs,
      });
      const parsed = z.array(ContentItemSchema).safeParse(body);
      return parsed.success ? parsed.data : [];
    } catch (err) {
      if (err instanceof HttpError && err.status === 404) return [];
      throw err;
    }
  }
}
