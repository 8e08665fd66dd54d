// ============================================================================
// TagWatch — Tracker Confidence Scoring
// ============================================================================
import type { CadenceStats, DecodedPayload, ScoringPolicy, StatusBitTable, TrackerClassification, TrackerScore } from '@tagwatch/shared';
import { DEFAULT_STATUS_BITS, isCleanStatus } from './decoder.js';

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  registeredBase: 60,
  registeredCadenceBonus: 15,
  cleanStatusBonus: 10,
  rotationBonus: 5,
  unregisteredBase: 45,
  unregisteredCadenceBonus: 15,
  genericBase: 35,
  genericCadenceBonus: 10,
  confirmedThreshold: 80,
  likelyThreshold: 50,
  unregisteredThreshold: 45,
};

function rawScore(payload: DecodedPayload, cadence: CadenceStats, policy: ScoringPolicy, bits: StatusBitTable): number {
  const cadenceMatch = cadence.matchesExpectedAirTagCadence;
  switch (payload.kind) {
    case 'airtag-registered': {
      let s = policy.registeredBase;
      if (cadenceMatch) s += policy.registeredCadenceBonus;
      if (isCleanStatus(payload.statusByte, bits)) s += policy.cleanStatusBonus;
      // live key rotation is hard to fake with a replayed payload
      if (cadence.rotationObserved) s += policy.rotationBonus;
      return s;
    }
    case 'airtag-unregistered':
      return policy.unregisteredBase + (cadenceMatch ? policy.unregisteredCadenceBonus : 0);
    case 'findmy-generic':
      return policy.genericBase + (cadenceMatch ? policy.genericCadenceBonus : 0);
    case 'other-ble':
    case 'unknown':
      return 0;
  }
}

/** Threshold table. Order matters: the unregistered bucket outranks the generic one. */
export function classify(kind: DecodedPayload['kind'], score: number, policy: ScoringPolicy = DEFAULT_SCORING_POLICY): TrackerClassification {
  if (kind === 'airtag-registered' && score >= policy.confirmedThreshold) return 'confirmed-airtag';
  if (kind === 'airtag-unregistered' && score >= policy.unregisteredThreshold) return 'unregistered-airtag';
  if (score >= policy.likelyThreshold) return 'likely-findmy';
  return 'not-a-tracker';
}

export function score(
  payload: DecodedPayload,
  cadence: CadenceStats,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
  bits: StatusBitTable = DEFAULT_STATUS_BITS,
): TrackerScore {
  const s = Math.max(0, Math.min(100, rawScore(payload, cadence, policy, bits)));
  return { score: s, classification: classify(payload.kind, s, policy) };
}
