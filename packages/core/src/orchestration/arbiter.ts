/**
 * Arbiter -- settles the playcount and tag sources' picks into one
 * recommendation and applies the user's answer to the blackboard.
 */

import type { Candidate } from '../blackboard/candidate.js';
import { createAssertion } from '../blackboard/hypothesis.js';
import type { Workspace } from '../blackboard/workspace.js';
import type { GatherSource } from '../sources/gather.js';
import type { ScoringSource } from '../sources/types.js';

export interface ArbiterSources {
  playcount: ScoringSource;
  tags: ScoringSource;
  gatherer: GatherSource;
}

export class Arbiter {
  constructor(
    private readonly board: Workspace,
    private readonly sources: ArbiterSources,
    private readonly gatherCount: number,
  ) {}

  /** Null once the pool is exhausted or neither source has a pick. */
  async recommend(): Promise<Candidate | null> {
    if (this.board.pool.length === 0) return null;

    const byPlaycount = await this.sources.playcount.choose();
    const byTags = await this.sources.tags.choose();

    if (byPlaycount && byTags) {
      // Ties go to the playcount source.
      return byPlaycount.score >= byTags.score ? byPlaycount.candidate : byTags.candidate;
    }
    return byPlaycount?.candidate ?? byTags?.candidate ?? null;
  }

  /** The accepted track becomes the new reference and the pool starts over from it. */
  async accept(candidate: Candidate): Promise<number> {
    this.board.activity.append('feedback_sent', `accepted: ${candidate.id}`);
    await candidate.notify('accepted');
    this.board.clearPool();

    const liked = createAssertion(candidate, candidate.source, 'liked');
    this.board.record(liked);
    this.board.setSolving(liked);

    return this.sources.gatherer.gather(candidate.artist, candidate.name, this.gatherCount);
  }

  async reject(candidate: Candidate): Promise<void> {
    this.board.evict(candidate);
    this.board.record(createAssertion(candidate, candidate.source, 'disliked'));
    this.board.activity.append('feedback_sent', `rejected: ${candidate.id}`);
    await candidate.notify('rejected');
    candidate.detach();
  }
}
