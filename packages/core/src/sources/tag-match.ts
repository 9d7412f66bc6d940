import type { Candidate } from '../blackboard/candidate.js';
import type { Workspace } from '../blackboard/workspace.js';
import type { TrackProvider } from '../provider/types.js';
import { MAX_TAGS } from '../types.js';
import { proposeOnce, resignCurrent } from './bookkeeping.js';
import type { ScoredPick, ScoringSource } from './types.js';

/**
 * Picks the pool track sharing the most top tags with the reference.
 * Ties keep the first track found. Score is the share of reference tags matched.
 */
export class TagMatchSource implements ScoringSource {
  readonly kind = 'tag-match';
  readonly name = 'TagMatchSource';

  constructor(
    private readonly board: Workspace,
    private readonly provider: TrackProvider,
    private readonly tagLimit = MAX_TAGS,
  ) {}

  async tagsFor(candidate: Candidate): Promise<string[]> {
    if (candidate.tags) return candidate.tags;
    const tags = await this.provider.getTopTags(candidate.artist, candidate.name, this.tagLimit);
    candidate.tags = tags.slice(0, this.tagLimit);
    return candidate.tags;
  }

  async choose(): Promise<ScoredPick | null> {
    const wanted = await this.tagsFor(this.board.reference());

    let bestCount = 0;
    let best: Candidate | null = null;
    for (const candidate of this.board.pool) {
      const tags = await this.tagsFor(candidate);
      const matched = wanted.filter((tag) => tags.includes(tag)).length;
      if (matched > bestCount) {
        bestCount = matched;
        best = candidate;
      }
    }

    if (!best) {
      resignCurrent(this.board, this);
      return null;
    }
    const score = (bestCount / wanted.length) * 100;
    proposeOnce(this.board, this, best, 'Closest match on tags', score);
    return { candidate: best, score };
  }

  async onFeedback(): Promise<void> {
    resignCurrent(this.board, this);
  }
}
