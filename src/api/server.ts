import Fastify from 'fastify';
import { getLogger } from '../utils/logging.js';
import { recordRoutes } from './routes/records.js';
import { RepositoryError, NotFoundError } from '../repositories/errors.js';
import { AuditRepository } from '../repositories/auditRepository.js';
import { ExtractionRepository } from '../repositories/extractionRepository.js';
import { RunStateRepository } from '../repositories/runStateRepository.js';
import { TargetRepository } from '../repositories/targetRepository.js';
import { getDb, type DatabaseClient } from '../db/client.js';
import { registry } from '../metrics/index.js';

export interface ServerOptions {
  db?: DatabaseClient;
}

export async function buildServer(opts: ServerOptions = {}) {
  const app = Fastify({ logger: getLogger() });
  const db = opts.db ?? getDb();

  // Unified error handler (routes registered below inherit it)
  app.setErrorHandler((error, _req, reply) => {
    if (error instanceof NotFoundError) {
      return reply.status(404).send({ error: { code: 'NOT_FOUND', message: error.message } });
    }
    if (error instanceof RepositoryError) {
      return reply
        .status(500)
        .send({ error: { code: 'REPOSITORY_ERROR', message: error.message } });
    }
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  const runState = new RunStateRepository(db);
  const targets = new TargetRepository(db);

  app.get('/healthz', async () => {
    const [snapshot, known] = await Promise.all([runState.snapshot(), targets.list()]);
    return {
      status: 'ok',
      time: new Date().toISOString(),
      build: {
        version: process.env.npm_package_version || 'dev',
        node: process.version,
      },
      run: {
        state: snapshot.state,
        updatedAt: snapshot.updatedAt ? snapshot.updatedAt.toISOString() : null,
      },
      targets: { count: known.length },
    };
  });

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  await app.register(
    recordRoutes({ audit: new AuditRepository(db), targets, extractions: new ExtractionRepository(db) }),
  );
  return app;
}
