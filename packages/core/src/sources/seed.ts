import { Candidate, type Notifiable } from '../blackboard/candidate.js';
import { createAssertion } from '../blackboard/hypothesis.js';
import type { Workspace } from '../blackboard/workspace.js';
import type { TrackInfo, TrackProvider } from '../provider/types.js';
import { trackKey } from '../utils.js';

/** Loads the user's chosen track and makes it the reference everything is scored against. */
export class SeedSource implements Notifiable {
  readonly kind = 'seed';
  readonly name = 'SeedSource';

  private thinkingAbout: string | null = null;
  private lastInfo: TrackInfo | null = null;

  constructor(
    private readonly board: Workspace,
    private readonly provider: TrackProvider,
  ) {}

  async load(artist: string, track: string): Promise<Candidate> {
    const key = trackKey(artist, track);
    let info = this.lastInfo;
    if (!info || this.thinkingAbout !== key) {
      info = await this.provider.getTrackInfo(artist, track);
      this.lastInfo = info;
      this.thinkingAbout = key;
    }

    const seed = Candidate.fromTrackInfo(this, info);
    seed.subscribe(this);
    const initial = createAssertion(seed, this, 'initial');
    this.board.record(initial);
    this.board.setSolving(initial);
    return seed;
  }

  async onFeedback(): Promise<void> {
    // The seed never competes for a recommendation.
  }
}
