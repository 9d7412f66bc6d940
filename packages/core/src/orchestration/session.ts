/**
 * Recommendation session loop.
 *
 * 1. Ask for a seed track, load it, gather the first pool
 * 2. Ask the arbiter for a pick and show the board
 * 3. Present the pick; a "yes" moves the reference, a "no" drops the track
 * 4. Repeat until the pool runs dry or the user stops
 */

import { ActivityLog, type ActivityListener } from '../activity.js';
import type { Candidate } from '../blackboard/candidate.js';
import { Workspace, type BoardSnapshot } from '../blackboard/workspace.js';
import type { TrackProvider } from '../provider/types.js';
import { GatherSource } from '../sources/gather.js';
import { PlaycountSource } from '../sources/playcount.js';
import { SeedSource } from '../sources/seed.js';
import { TagMatchSource } from '../sources/tag-match.js';
import { SessionConfigSchema, type Feedback, type SessionConfig, type SessionConfigInput } from '../types.js';
import { Arbiter } from './arbiter.js';

export interface SeedRequest {
  artist: string;
  track: string;
}

export interface Presenter {
  promptSeed(): Promise<SeedRequest>;
  showCycleState(board: BoardSnapshot): void;
  presentCandidate(candidate: Candidate): Promise<Feedback>;
  /** Asked after a "yes": keep going from the liked track? */
  confirmContinue(): Promise<boolean>;
  announceProgress(message: string): void;
  announceExhausted(): void;
  announceSessionEnd(): void;
}

export interface SessionOptions {
  provider: TrackProvider;
  presenter: Presenter;
  config?: SessionConfigInput;
  onActivity?: ActivityListener;
}

export interface SessionOutcome {
  reason: 'exhausted' | 'ended';
  liked: Candidate[];
  rounds: number;
}

export class RecommendationSession {
  readonly config: SessionConfig;
  readonly board: Workspace;
  readonly seed: SeedSource;
  readonly gatherer: GatherSource;
  readonly tags: TagMatchSource;
  readonly playcount: PlaycountSource;
  readonly arbiter: Arbiter;
  private readonly presenter: Presenter;

  constructor(options: SessionOptions) {
    this.config = SessionConfigSchema.parse(options.config ?? {});
    this.presenter = options.presenter;
    this.board = new Workspace(new ActivityLog(options.onActivity));
    this.seed = new SeedSource(this.board, options.provider);
    this.gatherer = new GatherSource(this.board, options.provider, {
      similarLimit: this.config.similarLimit,
      refillCount: this.config.refillCount,
    });
    this.tags = new TagMatchSource(this.board, options.provider, this.config.tagLimit);
    this.playcount = new PlaycountSource(this.board);
    this.arbiter = new Arbiter(
      this.board,
      { playcount: this.playcount, tags: this.tags, gatherer: this.gatherer },
      this.config.initialCount,
    );
  }

  /**
   * Load the reference track and fill the first pool. The feed is keyed on
   * the provider's spelling of the artist, the same one later refills use.
   */
  async start(artist: string, track: string): Promise<Candidate> {
    const seed = await this.seed.load(artist, track);
    this.presenter.announceProgress('getting similar artists and songs...');
    await this.gatherer.gather(seed.artist, seed.name, this.config.initialCount);
    return seed;
  }

  async run(): Promise<SessionOutcome> {
    const { artist, track } = await this.presenter.promptSeed();
    await this.start(artist, track);

    const liked: Candidate[] = [];
    let rounds = 0;
    for (;;) {
      this.presenter.announceProgress('evaluating...');
      const pick = await this.arbiter.recommend();
      this.presenter.showCycleState(this.board.snapshot());

      if (!pick) {
        this.presenter.announceExhausted();
        return { reason: 'exhausted', liked, rounds };
      }
      rounds++;

      const feedback = await this.presenter.presentCandidate(pick);
      if (feedback === 'rejected') {
        await this.arbiter.reject(pick);
        continue;
      }

      liked.push(pick);
      if (!(await this.presenter.confirmContinue())) {
        this.presenter.announceSessionEnd();
        return { reason: 'ended', liked, rounds };
      }
      this.presenter.announceProgress('getting similar artists and songs...');
      await this.arbiter.accept(pick);
    }
  }
}
