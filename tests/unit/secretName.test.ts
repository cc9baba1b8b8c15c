import { describe, it, expect } from 'vitest';
import { deriveSecretName, SECRET_NAME_PATTERN } from '../../src/utils/secretName.js';
import { platformFromLocator } from '../../src/utils/platform.js';

describe('deriveSecretName', () => {
  it.each([
    ['acme/web-app', 'ACMEWEBAPP'],
    ['42-tools', 'REPO_42TOOLS'],
    ['_private', 'REPO__PRIVATE'],
    ['Org/My_Service.v2', 'ORGMY_SERVICEV2'],
    ['', 'REPO_'],
  ])('%s -> %s', (input, expected) => {
    expect(deriveSecretName(input)).toBe(expected);
  });

  it('always yields a valid, stable name', () => {
    const samples = ['a', '9', 'ünïcode/repo', 'x y z', '---', 'acme/API_v1', '__', 'Zz/00'];
    for (const s of samples) {
      const name = deriveSecretName(s);
      expect(name).toMatch(SECRET_NAME_PATTERN);
      expect(deriveSecretName(s)).toBe(name);
      expect(deriveSecretName(name)).toBe(name);
    }
  });
});

describe('platformFromLocator', () => {
  it.each([
    ['https://github.com/acme/web', 'github'],
    ['https://gitlab.example.com/x', 'example'],
    ['http://localhost:8080/', 'localhost'],
    ['not a url', 'unknown'],
  ])('%s -> %s', (locator, expected) => {
    expect(platformFromLocator(locator)).toBe(expected);
  });
});
