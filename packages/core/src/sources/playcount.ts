/**
 * Playcount source -- a small state machine over five strategies.
 *
 *   closest       smallest |delta| to the reference playcount
 *   more / fewer  nearest track on the far side of the closest one
 *   a-lot-more / a-lot-fewer  the most extreme track in that direction
 *
 * Rejections walk escalating strategy queues; running a queue dry marks the
 * source POOR and damps its scores. An acceptance marks it GOOD.
 */

import type { Candidate } from '../blackboard/candidate.js';
import type { Workspace } from '../blackboard/workspace.js';
import type { Feedback, PlaycountStrategy, SourceQuality } from '../types.js';
import { proposeOnce, resignCurrent } from './bookkeeping.js';
import type { ScoredPick, ScoringSource } from './types.js';

export interface Bucket {
  delta: number;
  candidate: Candidate | null;
  score: number;
}

export type Buckets = Record<PlaycountStrategy, Bucket>;

type Direction = 'more' | 'fewer';

const PAIRED: Record<Exclude<PlaycountStrategy, 'closest'>, PlaycountStrategy> = {
  'a-lot-more': 'more',
  more: 'a-lot-more',
  'a-lot-fewer': 'fewer',
  fewer: 'a-lot-fewer',
};

const QUALITY_MULT: Record<SourceQuality, number> = {
  GOOD: 1.25,
  POOR: 0.75,
};

// Popped from the end: the escalating strategy is tried first.
function initialQueues(): Record<Direction, PlaycountStrategy[]> {
  return { more: ['more', 'a-lot-more'], fewer: ['fewer', 'a-lot-fewer'] };
}

function emptyBucket(delta: number): Bucket {
  return { delta, candidate: null, score: 0 };
}

/** Sort the pool into the five strategy buckets in a single pass. */
export function rankByPlaycount(pool: readonly Candidate[], referencePlaycount: number): Buckets {
  const base = Math.max(referencePlaycount, 1);
  const b: Buckets = {
    closest: emptyBucket(Number.POSITIVE_INFINITY),
    'a-lot-more': emptyBucket(Number.NEGATIVE_INFINITY),
    'a-lot-fewer': emptyBucket(Number.POSITIVE_INFINITY),
    more: emptyBucket(Number.POSITIVE_INFINITY),
    fewer: emptyBucket(Number.NEGATIVE_INFINITY),
  };

  for (const candidate of pool) {
    const delta = candidate.playcount - referencePlaycount;
    const pct = Math.abs(delta / base) * 100;

    if (Math.abs(delta) < Math.abs(b.closest.delta)) {
      // The displaced closest now sits on one side of the new one.
      if (b.closest.delta > delta) b.more = { ...b.closest };
      else if (b.closest.delta < delta) b.fewer = { ...b.closest };
      b.closest = { delta, candidate, score: 100 - pct };
    }
    if (delta > 0 && delta > b['a-lot-more'].delta) {
      b['a-lot-more'] = { delta, candidate, score: pct };
    }
    if (delta < 0 && delta < b['a-lot-fewer'].delta) {
      b['a-lot-fewer'] = { delta, candidate, score: pct };
    }
    if (delta > 0 && delta < b.more.delta && delta > b.closest.delta) {
      b.more = { delta, candidate, score: 100 - pct };
    }
    if (delta < 0 && delta > b.fewer.delta && delta < b.closest.delta) {
      b.fewer = { delta, candidate, score: 100 - pct };
    }
  }

  return b;
}

/** Resolve a strategy to a non-empty bucket: itself, its pair, then closest. */
export function applyFallback(strategy: PlaycountStrategy, buckets: Buckets): [PlaycountStrategy, Bucket] {
  if (buckets[strategy].candidate || strategy === 'closest') return [strategy, buckets[strategy]];
  const paired = PAIRED[strategy];
  if (buckets[paired].candidate) return [paired, buckets[paired]];
  return ['closest', buckets.closest];
}

export class PlaycountSource implements ScoringSource {
  readonly kind = 'playcount-match';
  readonly name = 'PlaycountSource';

  private tryThis: PlaycountStrategy | null = null;
  private sourceQuality: SourceQuality | null = null;
  private queues = initialQueues();

  constructor(private readonly board: Workspace) {}

  get strategy(): PlaycountStrategy | null {
    return this.tryThis;
  }

  get quality(): SourceQuality | null {
    return this.sourceQuality;
  }

  /** Strategies left to try after rejections, per direction. */
  get pending(): Readonly<Record<Direction, readonly PlaycountStrategy[]>> {
    return this.queues;
  }

  useStrategy(strategy: PlaycountStrategy | null): void {
    this.tryThis = strategy;
  }

  async choose(): Promise<ScoredPick | null> {
    if (this.board.pool.length === 0) {
      resignCurrent(this.board, this);
      return null;
    }

    const buckets = rankByPlaycount(this.board.pool, this.board.reference().playcount);
    const [strategy, bucket] = applyFallback(this.tryThis ?? 'closest', buckets);
    this.tryThis = strategy;
    if (!bucket.candidate) return null;

    const score = bucket.score * (this.sourceQuality ? QUALITY_MULT[this.sourceQuality] : 1);
    proposeOnce(this.board, this, bucket.candidate, `Try ${strategy}`, score);
    return { candidate: bucket.candidate, score };
  }

  async onFeedback(candidate: Candidate, feedback: Feedback): Promise<void> {
    resignCurrent(this.board, this);
    if (feedback === 'accepted') {
      this.sourceQuality = 'GOOD';
      this.queues = initialQueues();
      return;
    }

    const reference = this.board.solving?.candidate;
    const direction: Direction = !reference || candidate.playcount < reference.playcount ? 'more' : 'fewer';
    this.tryThis = this.queues[direction].pop() ?? null;

    if (!this.tryThis) {
      this.sourceQuality = 'POOR';
      this.queues = initialQueues();
      this.board.activity.append(
        'strategy_exhausted',
        `${this.name} has tried all its strategies without success`,
        'applying a penalty to its suggestions',
      );
    }
  }
}
