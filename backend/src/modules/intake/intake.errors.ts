/**
 * src/modules/intake/intake.errors.ts
 *
 * WHY:
 * - Intake module owns its domain-specific error semantics.
 * - Lower layers return typed results; flows turn rejections into these.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include collected values, emails, or tokens in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { SessionStatus } from './intake.types';

export const IntakeErrors = {
  sessionNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Intake session not found.', meta);
  },

  /** Submitted, Abandoned or Expired: the session accepts no further activity. */
  sessionInactive(status: SessionStatus, meta?: AppErrorMeta) {
    return AppError.conflict('This intake session is no longer active.', { ...meta, status });
  },

  invalidTransition(attempted: SessionStatus, current: SessionStatus) {
    return AppError.invalidTransition(`Cannot move session from ${current} to ${attempted}.`, {
      attempted,
      current,
    });
  },

  unknownField(fieldName: string) {
    return AppError.validationError('Unknown intake field.', { fieldName });
  },

  /** Recovery needs the contact identity to have been collected first. */
  contactMissing(meta?: AppErrorMeta) {
    return AppError.conflict('No contact email has been collected for this session yet.', meta);
  },

  rateLimited(retryAfterSeconds: number) {
    return AppError.rateLimited('Too many recovery requests. Please try again later.', {
      retryAfterSeconds,
    });
  },

  /**
   * Unknown, already used, or expired recovery token.
   * One error for all three: the caller must not learn which one it was.
   */
  recoveryTokenInvalid(meta?: AppErrorMeta) {
    return AppError.tokenInvalid(
      'This recovery link is invalid or has expired. Please request a new one.',
      meta,
    );
  },

  /** Concurrent writers kept winning; the caller may simply try again. */
  transientFailure(meta?: AppErrorMeta) {
    return AppError.transient('The session is busy. Please try again.', meta);
  },
} as const;
