import type { FieldCipher } from '../../src/shared/security/encryption';
import type { IntakeSession, ProgressSnapshot } from '../../src/modules/intake/intake.types';
import { loadPhaseDefinition } from '../../src/modules/intake/phases/phase-definition';

/** Readable stand-in for AES: lets assertions see what was stored. */
export const fakeCipher: FieldCipher = {
  encrypt: (plaintext) => `enc(${plaintext})`,
  decrypt: (ciphertext) => ciphertext.slice('enc('.length, -1),
};

/** Two phases: an intro without fields, then two required fields. */
export const TWO_PHASE_DEF = loadPhaseDefinition({
  version: 1,
  phases: [
    { name: 'Welcome', baselineMinutes: 1, fields: [] },
    {
      name: 'ParentInfo',
      baselineMinutes: 10,
      fields: [
        { name: 'firstName', prompt: 'First name?' },
        { name: 'email', prompt: 'Email?', contact: true },
      ],
    },
  ],
});

/** Three timed phases for pace-multiplier math (baselines 10 / 10 / 20). */
export const PACED_DEF = loadPhaseDefinition({
  version: 1,
  phases: [
    { name: 'one', baselineMinutes: 10, fields: [{ name: 'x', prompt: 'X?' }] },
    { name: 'two', baselineMinutes: 10, fields: [{ name: 'y', prompt: 'Y?' }] },
    { name: 'three', baselineMinutes: 20, fields: [{ name: 'z', prompt: 'Z?' }] },
  ],
});

export function makeSnapshot(overrides: Partial<ProgressSnapshot> = {}): ProgressSnapshot {
  return {
    currentPhase: 'parentInfo',
    completedFields: [],
    fieldMetadata: {},
    lastPercentage: 0,
    phaseTimings: {},
    ...overrides,
  };
}

export const T0 = new Date('2026-03-02T09:00:00.000Z');

export function makeSession(overrides: Partial<IntakeSession> = {}): IntakeSession {
  return {
    id: '6f1c2a34-5b6d-4e7f-8a9b-0c1d2e3f4a5b',
    status: 'Started',
    progressSnapshot: makeSnapshot(),
    collectedValues: {},
    referralSource: null,
    expiresAt: new Date(T0.getTime() + 24 * 3600 * 1000),
    createdAt: T0,
    updatedAt: T0,
    version: 0,
    ...overrides,
  };
}
