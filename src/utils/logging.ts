import pino, { DestinationStream, LoggerOptions } from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

// Structured fields that must never reach a log line verbatim.
export const REDACT_PATHS = [
  'value',
  'password',
  'token',
  'secret',
  'cookie',
  'cookies',
  'authorization',
  'payload',
  '*.value',
  '*.password',
  '*.token',
  '*.secret',
  '*.cookie',
  'headers.authorization',
  'req.headers.authorization',
  'req.headers.cookie',
];

function baseOptions(level: string): LoggerOptions {
  return {
    level,
    base: { service: 'cookie-relay' },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };
}

function collectorSink(): { logs: string[]; sink: DestinationStream } {
  const logs: string[] = [];
  (globalThis as unknown as { __LOG_COLLECTOR__?: string[] }).__LOG_COLLECTOR__ = logs;
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  return { logs, sink: sink as unknown as DestinationStream };
}

export function getLogger() {
  if (!loggerInstance) {
    const cfg = loadConfig();
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      loggerInstance = pino(baseOptions(cfg.logging.level), collectorSink().sink);
    } else {
      loggerInstance = pino({
        ...baseOptions(cfg.logging.level),
        transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
      });
    }
  }
  return loggerInstance;
}

// Test-only helper to reset singleton (not exported in production docs)
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector() {
  const cfg = loadConfig();
  const { logs, sink } = collectorSink();
  loggerInstance = pino(baseOptions(cfg.logging.level), sink);
  return logs;
}
