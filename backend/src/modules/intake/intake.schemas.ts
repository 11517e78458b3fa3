/**
 * src/modules/intake/intake.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the intake module.
 * - Prevents invalid payloads from reaching flows.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Field names are only shape-checked here; the flow checks them against the
 *   phase definition.
 * - Token min-length guards against obviously garbage values; the flow decides validity.
 */

import { z } from 'zod';

export const sessionParamsSchema = z.object({
  sessionId: z.string().uuid('Invalid session id'),
});

export const createSessionSchema = z
  .object({
    referralSource: z.string().trim().min(1).max(200).optional(),
  })
  .default({});

export const submitFieldSchema = z
  .object({
    fieldName: z.string().min(1).max(100),
    extractedValue: z.string().max(5000),
    confidence: z.number().min(0).max(1),
    needsClarification: z.boolean().default(false),
  })
  .refine((input) => input.needsClarification || input.extractedValue.trim().length > 0, {
    message: 'extractedValue is required unless clarification is needed',
    path: ['extractedValue'],
  });

export const advanceStatusSchema = z.object({
  status: z.enum(['InProgress', 'InsurancePending', 'AssessmentComplete', 'Submitted']),
});

export const redeemRecoverySchema = z.object({
  token: z.string().min(20, 'Invalid recovery token').max(200, 'Invalid recovery token'),
});
