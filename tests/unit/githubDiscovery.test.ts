import { describe, it, expect, vi, afterEach } from 'vitest';
import { GitHubDiscovery, scoreRepository } from '../../src/collaborators/githubDiscovery.js';
import { HttpError } from '../../src/utils/http.js';
import { jsonResponse, stubFetch } from '../utils/http.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('scoreRepository', () => {
  it('adds 0.1 per config-like root file and up to 0.5 for stars', () => {
    const entries = [
      { type: 'file', name: '.env' },
      { type: 'file', name: 'app.py' },
      { type: 'dir', name: 'config.json' },
      { type: 'file', name: 'README.md' },
    ];
    expect(scoreRepository(entries, 250)).toBe(0.45);
    expect(scoreRepository([], 10000)).toBe(0.5);
  });

  it('caps the total at 1', () => {
    const entries = Array.from({ length: 8 }, (_, i) => ({ type: 'file', name: `f${i}.yaml` }));
    expect(scoreRepository(entries, 5000)).toBe(1);
  });
});

describe('GitHubDiscovery', () => {
  const discovery = new GitHubDiscovery({
    apiUrl: 'https://api.example.test',
    org: 'acme',
    token: 'test-token',
  });

  it('keeps non-archived repositories with a positive score, best first', async () => {
    stubFetch((url) => {
      switch (url) {
        case 'https://api.example.test/orgs/acme/repos?per_page=100&page=1':
          return jsonResponse([
            {
              full_name: 'acme/web',
              html_url: 'https://github.com/acme/web',
              stargazers_count: 100,
              description: 'Customer portal',
            },
            { full_name: 'acme/empty', html_url: 'https://github.com/acme/empty', stargazers_count: 0 },
            { full_name: 'acme/old', html_url: 'https://github.com/acme/old', stargazers_count: 900, archived: true },
            { full_name: 'acme/api', html_url: 'https://github.com/acme/api', stargazers_count: 400, description: null },
          ]);
        case 'https://api.example.test/repos/acme/web/contents/':
          return jsonResponse([
            { type: 'file', name: 'package.json' },
            { type: 'file', name: 'index.js' },
          ]);
        case 'https://api.example.test/repos/acme/api/contents/':
          return jsonResponse([{ type: 'file', name: 'docker-compose.yml' }]);
        default:
          return jsonResponse({ message: 'Not Found' }, 404);
      }
    });

    const targets = await discovery.discover();

    expect(targets).toEqual([
      { identifier: 'acme/api', locator: 'https://github.com/acme/api', relevanceScore: 0.5 },
      {
        identifier: 'acme/web',
        locator: 'https://github.com/acme/web',
        relevanceScore: 0.3,
        description: 'Customer portal',
      },
    ]);
    expect(targets.every((t) => Object.isFrozen(t))).toBe(true);
    expect('description' in targets[0]).toBe(false);
  });

  it('fails when the organisation listing fails', async () => {
    stubFetch(() => jsonResponse({ message: 'Server Error' }, 500));
    await expect(discovery.discover()).rejects.toBeInstanceOf(HttpError);
  });
});
