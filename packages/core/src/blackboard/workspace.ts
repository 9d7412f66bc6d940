/**
 * Workspace -- the blackboard every knowledge source reads and writes.
 *
 * Holds the candidate pool (insertion order = display order), the append-only
 * hypothesis log, and the `solving` hypothesis all scoring is relative to.
 * Each mutation is mirrored into the activity log.
 */

import { ActivityLog } from '../activity.js';
import { InvariantViolation } from '../errors.js';
import { PERMANENT_KINDS } from '../types.js';
import type { Candidate, Notifiable } from './candidate.js';
import type { Hypothesis } from './hypothesis.js';

export interface BoardSnapshot {
  pool: readonly Candidate[];
  hypotheses: readonly Hypothesis[];
  solving: Hypothesis | null;
}

export class Workspace {
  private readonly poolList: Candidate[] = [];
  private readonly log: Hypothesis[] = [];
  private current: Hypothesis | null = null;

  constructor(readonly activity: ActivityLog = new ActivityLog()) {}

  get pool(): readonly Candidate[] {
    return this.poolList;
  }

  get hypotheses(): readonly Hypothesis[] {
    return this.log;
  }

  get solving(): Hypothesis | null {
    return this.current;
  }

  /** The track being solved for. Scoring before a seed is loaded is a logic error. */
  reference(): Candidate {
    if (!this.current) throw new InvariantViolation('No reference track: load a seed first');
    return this.current.candidate;
  }

  has(id: string): boolean {
    return this.poolList.some((c) => c.id === id);
  }

  /** Identities the user has already seen an answer for (seed, liked, disliked). */
  considered(): Set<string> {
    return new Set(
      this.log.filter((h) => PERMANENT_KINDS.includes(h.kind)).map((h) => h.candidate.id),
    );
  }

  admit(candidate: Candidate): void {
    if (this.has(candidate.id)) {
      throw new InvariantViolation(`Duplicate candidate: ${candidate.id}`);
    }
    this.poolList.push(candidate);
    this.activity.append('candidate_admitted', candidate.id, `from ${candidate.source.name}`);
  }

  /**
   * Remove from the pool only. Subscribers stay attached so a notification
   * sent after eviction still reaches them; callers `detach()` once it is done.
   */
  evict(candidate: Candidate): void {
    const idx = this.poolList.indexOf(candidate);
    if (idx === -1) return;
    this.poolList.splice(idx, 1);
    this.activity.append('candidate_evicted', candidate.id);
  }

  /** Evict everything and cut every subscription to the evicted candidates. */
  clearPool(): void {
    for (const candidate of [...this.poolList]) {
      this.evict(candidate);
      candidate.detach();
    }
  }

  record(hypothesis: Hypothesis): void {
    this.log.push(hypothesis);
    this.activity.append(
      'hypothesis_recorded',
      `${hypothesis.reason}: ${hypothesis.candidate.id}`,
      `by ${hypothesis.source.name}${hypothesis.score !== undefined ? `, score ${hypothesis.score.toFixed(2)}` : ''}`,
    );
  }

  retract(hypothesis: Hypothesis): void {
    if (!hypothesis.retractable) {
      throw new InvariantViolation(
        `Cannot retract permanent hypothesis "${hypothesis.reason}" for ${hypothesis.candidate.id}`,
      );
    }
    const idx = this.log.indexOf(hypothesis);
    if (idx === -1) return;
    this.log.splice(idx, 1);
    this.activity.append(
      'hypothesis_retracted',
      `${hypothesis.reason}: ${hypothesis.candidate.id}`,
      `by ${hypothesis.source.name}`,
    );
  }

  setSolving(hypothesis: Hypothesis): void {
    if (hypothesis.kind !== 'initial' && hypothesis.kind !== 'liked') {
      throw new InvariantViolation(`Only an initial or liked track can be solved for, got ${hypothesis.kind}`);
    }
    this.current = hypothesis;
    this.activity.append('solving_changed', hypothesis.candidate.id, hypothesis.reason);
  }

  /** The one retractable hypothesis a source may hold, if any. */
  retractableBy(source: Notifiable): Hypothesis | undefined {
    return this.log.find((h) => h.source === source && h.retractable);
  }

  snapshot(): BoardSnapshot {
    return {
      pool: [...this.poolList],
      hypotheses: [...this.log],
      solving: this.current,
    };
  }
}
