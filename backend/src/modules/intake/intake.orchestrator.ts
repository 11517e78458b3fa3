/**
 * src/modules/intake/intake.orchestrator.ts
 *
 * WHY:
 * - Composition point of the intake core: one method per inbound event.
 *   Each delegates to a flow that calls the Progress Tracker, the Session State
 *   Machine, the field context and the Recovery Credential Service in order.
 *
 * RULES:
 * - Thin: no rules live here (they live in flows/ and the pure modules).
 * - No session state is cached between calls; every flow re-reads the stores.
 */

import type { IntakeDeps } from './intake.deps';
import type {
  CredentialGrant,
  FieldExtraction,
  NextAction,
  ProgressView,
  RequestMeta,
  SessionGrant,
  SessionStatus,
  SessionView,
} from './intake.types';

import { createSessionFlow } from './flows/session/create-session-flow';
import { getProgressFlow } from './flows/session/get-progress-flow';
import { advanceStatusFlow } from './flows/session/advance-status-flow';
import { abandonSessionFlow } from './flows/session/abandon-session-flow';
import { refreshCredentialFlow } from './flows/session/refresh-credential-flow';
import { submitFieldFlow } from './flows/fields/submit-field-flow';
import { requestRecoveryFlow } from './flows/recovery/request-recovery-flow';
import type { RequestRecoveryResult } from './flows/recovery/request-recovery-flow';
import { redeemRecoveryTokenFlow } from './flows/recovery/redeem-recovery-token-flow';

export class IntakeOrchestrator {
  constructor(private readonly deps: IntakeDeps) {}

  createSession(params: { referralSource: string | null; meta: RequestMeta }): Promise<SessionGrant> {
    return createSessionFlow(this.deps, params);
  }

  getProgress(params: { sessionId: string; meta: RequestMeta }): Promise<ProgressView> {
    return getProgressFlow(this.deps, params);
  }

  submitField(params: {
    sessionId: string;
    credential: string;
    extraction: FieldExtraction;
    meta: RequestMeta;
  }): Promise<NextAction> {
    return submitFieldFlow(this.deps, params);
  }

  advanceStatus(params: {
    sessionId: string;
    credential: string;
    target: SessionStatus;
    meta: RequestMeta;
  }): Promise<SessionView> {
    return advanceStatusFlow(this.deps, params);
  }

  abandonSession(params: { sessionId: string; meta: RequestMeta }): Promise<SessionView> {
    return abandonSessionFlow(this.deps, params);
  }

  refreshCredential(params: {
    sessionId: string;
    credential: string;
    meta: RequestMeta;
  }): Promise<CredentialGrant> {
    return refreshCredentialFlow(this.deps, params);
  }

  requestRecovery(params: { sessionId: string; meta: RequestMeta }): Promise<RequestRecoveryResult> {
    return requestRecoveryFlow(this.deps, params);
  }

  redeemRecoveryToken(params: { token: string; meta: RequestMeta }): Promise<SessionGrant> {
    return redeemRecoveryTokenFlow(this.deps, params);
  }
}
