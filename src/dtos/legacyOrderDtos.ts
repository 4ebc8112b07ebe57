import z from 'zod';
import { LegacyOrderSchema } from '../services/compat/legacySchema';

export const LegacyOrderParams = z.object({
  caseId: z.string().min(1).max(128),
});

const AuditDecisionSchema = z.object({
  step: z.string(),
  action: z.string(),
  details: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
});

export const AuditTrailSchema = z.object({
  decisions: z.array(AuditDecisionSchema),
  warnings: z.array(z.string()),
});

// Transformed orders match the v1 schema; v1 documents pass through as received
const LegacyOrderBody = z.union([LegacyOrderSchema, z.record(z.unknown())]);

export const ResponseClassSchema = z.enum(['OK', 'DEPRECATED', 'TRANSIENT', 'CLIENT_ERROR', 'OUTAGE']);

export const LegacyOrderResponse = z.object({
  order: LegacyOrderBody,
  audit: AuditTrailSchema,
  classification: ResponseClassSchema,
});

export const LegacyTransformResponse = z.object({
  order: LegacyOrderBody,
  audit: AuditTrailSchema,
});

export type LegacyOrderParamsType = z.infer<typeof LegacyOrderParams>;
