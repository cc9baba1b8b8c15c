import type { FastifyInstance } from 'fastify';
import {
  auditQuerySchema,
  extractionsParamsSchema,
  targetsQuerySchema,
  toPublicAudit,
  toPublicTarget,
} from '../schemas/querySchemas.js';
import type { AuditRepository } from '../../repositories/auditRepository.js';
import type { ExtractionRepository } from '../../repositories/extractionRepository.js';
import type { TargetRepository } from '../../repositories/targetRepository.js';

export interface RecordRouteDeps {
  audit: AuditRepository;
  targets: TargetRepository;
  extractions: ExtractionRepository;
}

// Read-only views over stored metadata. Nothing here can reach a cookie value.
export function recordRoutes(deps: RecordRouteDeps) {
  return async function register(app: FastifyInstance) {
    app.get('/v1/audit', async (req, reply) => {
      const parsed = auditQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
      }
      const { limit, eventType, target, status } = parsed.data;
      const records = await deps.audit.list({ limit, eventType, targetName: target, status });
      return { records: records.map(toPublicAudit) };
    });

    app.get('/v1/targets', async (req, reply) => {
      const parsed = targetsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
      }
      const filter =
        parsed.data.requiresCookies === undefined
          ? {}
          : { requiresCookies: parsed.data.requiresCookies === 'true' };
      const targets = await deps.targets.list(filter);
      return { targets: targets.map(toPublicTarget) };
    });

    // NotFoundError from getByName is mapped to 404 by the server's error handler
    app.get('/v1/targets/:owner/:repo/extractions', async (req, reply) => {
      const parsed = extractionsParamsSchema.safeParse(req.params);
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
      }
      const name = `${parsed.data.owner}/${parsed.data.repo}`;
      const target = await deps.targets.getByName(name);
      const extractions = await deps.extractions.listRecent(name);
      return {
        target: toPublicTarget(target),
        extractions: extractions.map((e) => ({
          platform: e.platform,
          artifactCount: e.artifactCount,
          twoFactorDetected: e.twoFactorDetected,
          succeeded: e.succeeded,
          errorMessage: e.errorMessage,
          extractedAt: e.extractedAt.toISOString(),
          expiresAt: e.expiresAt ? e.expiresAt.toISOString() : null,
        })),
      };
    });
  };
}
