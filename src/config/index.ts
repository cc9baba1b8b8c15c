import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { ConfigError, describe } from '../core/errors.js';
import { SensitiveBuffer } from '../security/sensitive.js';
import type { PlatformCredentials } from '../core/types.js';

dotenv.config();

const ConfigSchema = z.object({
  github: z.object({
    apiUrl: z.string().url(),
    org: z.string(),
    tokenEnv: z.string().min(1),
  }),
  storage: z.object({
    databasePath: z.string().min(1),
  }),
  advisor: z.object({
    apiUrl: z.string().url(),
    apiKeyEnv: z.string().min(1),
    model: z.string().min(1),
    timeoutMs: z.number().int().positive().default(30000),
  }),
  identity: z.object({
    enabled: z.boolean().default(false),
    command: z.string().min(1).default('warp-cli'),
    connectTimeoutMs: z.number().int().positive().default(30000),
    settleMs: z.number().int().nonnegative().default(2000),
    maxConsecutiveFailures: z.number().int().positive().default(3),
  }),
  browser: z.object({
    headless: z.boolean().default(true),
    navigationTimeoutMs: z.number().int().positive().default(30000),
    executablePath: z.string().min(1).optional(),
  }),
  credentials: z.object({
    envPrefix: z.string().min(1).default('USER_CREDENTIALS'),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    json: z.boolean().default(true),
  }),
  server: z.object({
    port: z.number().int().positive().default(3000),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG_FILE = 'relay.config.json';

const ObjectSchema = z.record(z.unknown());

function asObject(v: unknown): Record<string, unknown> {
  const parsed = ObjectSchema.safeParse(v);
  return parsed.success && !Array.isArray(v) ? parsed.data : {};
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  return asObject(raw[key]);
}

export function loadConfig(configPath = DEFAULT_CONFIG_FILE): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      fileRaw = asObject(JSON.parse(fs.readFileSync(full, 'utf8')));
    } catch (e) {
      throw new ConfigError(`Failed to parse config file ${full}: ${describe(e)}`, e);
    }
  }
  const merged = {
    github: {
      apiUrl: process.env.GITHUB_API_URL || 'https://api.github.com',
      org: process.env.GITHUB_ORG || '',
      tokenEnv: 'GITHUB_TOKEN',
      ...section(fileRaw, 'github'),
    },
    storage: {
      databasePath: process.env.DATABASE_PATH || 'data/cookie-relay.sqlite',
      ...section(fileRaw, 'storage'),
    },
    advisor: {
      apiUrl: process.env.ADVISOR_API_URL || 'https://open.bigmodel.cn/api/paas/v4/chat/completions',
      apiKeyEnv: 'ADVISOR_API_KEY',
      model: process.env.ADVISOR_MODEL || 'glm-4-air',
      ...section(fileRaw, 'advisor'),
    },
    identity: {
      enabled: process.env.WARP_ENABLED === '1',
      ...section(fileRaw, 'identity'),
    },
    browser: {
      headless: process.env.BROWSER_HEADLESS !== '0',
      executablePath: process.env.BROWSER_EXECUTABLE_PATH || undefined,
      ...section(fileRaw, 'browser'),
    },
    credentials: { ...section(fileRaw, 'credentials') },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: process.env.LOG_PRETTY !== '1',
      ...section(fileRaw, 'logging'),
    },
    server: {
      port: Number(process.env.PORT) || 3000,
      ...section(fileRaw, 'server'),
    },
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

export function getEnvValue(key: string): string | undefined {
  const v = process.env[key];
  return v === undefined || v === '' ? undefined : v;
}

const CredentialsSchema = z.object({
  username: z.string().default(''),
  password: z.string().default(''),
});

/**
 * Reads `<PREFIX>_<PLATFORM>` as JSON `{ "username", "password" }`.
 * The password is moved into a SensitiveBuffer; callers track it with the lifecycle guard.
 */
export function getCredentialsForPlatform(
  platform: string,
  cfg: Pick<AppConfig, 'credentials'> = loadConfig(),
): PlatformCredentials | null {
  const raw = getEnvValue(`${cfg.credentials.envPrefix}_${platform.toUpperCase()}`);
  if (!raw) return null;
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = CredentialsSchema.safeParse(json);
  if (!parsed.success) return null;
  return {
    username: parsed.data.username,
    password: SensitiveBuffer.fromString(parsed.data.password),
  };
}
