/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "the parent needs a recovery email" from "here is how emails are sent".
 *   The intake core enqueues; the transport (SQS, SendGrid, etc.) is wired in di.ts only.
 * - Enqueueing is the core's last step: delivery failures belong to the dispatcher and
 *   are never retried by the intake flows.
 *
 * RULES:
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - The raw recovery token is allowed here: it travels to the email renderer only.
 */

export type RecoveryEmailMessage = {
  type: 'intake.recovery-email';
  kind: 'recovery';
  sessionId: string;
  /** Decrypted contact identity; the renderer needs it as the recipient. */
  email: string;
  recoveryToken: string;
  recoveryUrl: string;
  expiresAt: string; // ISO
};

export type QueueMessage = RecoveryEmailMessage;

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
