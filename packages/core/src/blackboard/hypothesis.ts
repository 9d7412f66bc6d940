import type { HypothesisKind } from '../types.js';
import { HYPOTHESIS_REASONS } from '../types.js';
import { generateId, now } from '../utils.js';
import type { Candidate, Notifiable } from './candidate.js';

export type PermanentKind = Exclude<HypothesisKind, 'proposal'>;

/**
 * A claim about a candidate. Proposals are retractable and get replaced as
 * a source changes its mind; initial/liked/disliked are ground truth.
 */
export interface Hypothesis {
  readonly id: string;
  readonly candidate: Candidate;
  readonly source: Notifiable;
  readonly kind: HypothesisKind;
  readonly reason: string;
  readonly score?: number;
  readonly retractable: boolean;
  readonly createdAt: string;
}

export function createProposal(
  candidate: Candidate,
  source: Notifiable,
  reason: string,
  score?: number,
): Hypothesis {
  return {
    id: generateId('hyp'),
    candidate,
    source,
    kind: 'proposal',
    reason,
    score,
    retractable: true,
    createdAt: now(),
  };
}

export function createAssertion(candidate: Candidate, source: Notifiable, kind: PermanentKind): Hypothesis {
  return {
    id: generateId('hyp'),
    candidate,
    source,
    kind,
    reason: HYPOTHESIS_REASONS[kind],
    retractable: false,
    createdAt: now(),
  };
}

export function describeHypothesis(h: Hypothesis): string {
  const label = h.retractable ? 'Assumption' : 'Assertion';
  const claim = h.score !== undefined ? `${h.reason} with score of ${h.score.toFixed(2)}` : h.reason;
  return `${label}: ${h.candidate.id}, ${claim}: made by ${h.source.name}`;
}
