import { z } from 'zod';
import { AUDIT_STATUSES, type StoredAuditRecord, type TargetRecord } from '../../core/types.js';

export const auditStatusSchema = z.enum(AUDIT_STATUSES);

export const auditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  eventType: z.string().min(1).optional(),
  target: z.string().min(1).optional(),
  status: auditStatusSchema.optional(),
});

export const targetsQuerySchema = z.object({
  requiresCookies: z.enum(['true', 'false']).optional(),
});

export const extractionsParamsSchema = z.object({
  owner: z.string().min(1),
  repo: z.string().min(1),
});

export function toPublicAudit(r: StoredAuditRecord) {
  return {
    id: r.id,
    eventType: r.eventType,
    targetName: r.targetName ?? null,
    platform: r.platform ?? null,
    status: r.status,
    message: r.message ?? null,
    createdAt: r.createdAt.toISOString(),
  };
}

export function toPublicTarget(t: TargetRecord) {
  return {
    name: t.name,
    url: t.url,
    relevanceScore: t.relevanceScore,
    requiresCookies: t.requiresCookies,
    lastScannedAt: t.lastScannedAt ? t.lastScannedAt.toISOString() : null,
  };
}
