/**
 * Gather source -- keeps the pool stocked.
 *
 * For a seed artist it looks up similar artists and the top track of each,
 * then hands those out one at a time, least similar first, so the closest
 * matches are held back for later rounds.
 */

import { Candidate, type Notifiable } from '../blackboard/candidate.js';
import type { Workspace } from '../blackboard/workspace.js';
import { ProviderError } from '../errors.js';
import type { TrackProvider, TrackRef } from '../provider/types.js';
import type { Feedback } from '../types.js';
import { trackKey } from '../utils.js';

export interface GatherOptions {
  similarLimit: number;
  refillCount: number;
}

export class GatherSource implements Notifiable {
  readonly kind = 'gather';
  readonly name = 'GatherSource';

  private feedArtist: string | null = null;
  private feed: TrackRef[] = [];

  constructor(
    private readonly board: Workspace,
    private readonly provider: TrackProvider,
    private readonly options: GatherOptions,
  ) {}

  /** Tracks still waiting in the feed, in the order they will be tried. */
  get remaining(): readonly TrackRef[] {
    return this.feed;
  }

  /** Admit up to `count` new candidates. Returns how many made it into the pool. */
  async gather(artist: string, track: string, count: number): Promise<number> {
    if (this.feedArtist !== artist) {
      await this.buildFeed(artist, track);
    }

    let admitted = 0;
    while (admitted < count) {
      const candidate = await this.nextUnique();
      if (!candidate) break;
      this.board.admit(candidate);
      candidate.subscribe(this);
      admitted++;
    }
    return admitted;
  }

  async onFeedback(candidate: Candidate, feedback: Feedback): Promise<void> {
    if (feedback !== 'rejected' || candidate.source !== this) return;
    const solving = this.board.solving;
    if (!solving) return;
    await this.gather(solving.candidate.artist, solving.candidate.name, this.options.refillCount);
  }

  private async buildFeed(artist: string, track: string): Promise<void> {
    const similar = await this.provider.getSimilarArtists(artist, this.options.similarLimit);

    const topTracks: TrackRef[] = [];
    for (const similarArtist of similar) {
      try {
        topTracks.push(await this.provider.getTopTrack(similarArtist));
      } catch (err) {
        if (!(err instanceof ProviderError)) throw err;
        throw new ProviderError(
          `Could not look up top tracks for artists similar to ${artist}: ${err.message}`,
          err.method,
          err.status,
        );
      }
    }

    this.feed = topTracks.reverse();
    this.feedArtist = artist;
    this.board.activity.append(
      'feed_built',
      `${this.feed.length} tracks similar to ${trackKey(artist, track)}`,
    );
  }

  /** Pop feed items until one is neither pooled nor already answered. */
  private async nextUnique(): Promise<Candidate | null> {
    while (this.feed.length > 0) {
      const next = this.feed.shift();
      if (!next) break;
      const info = await this.provider.getTrackInfo(next.artist, next.name);
      const candidate = Candidate.fromTrackInfo(this, info);
      if (!this.board.has(candidate.id) && !this.board.considered().has(candidate.id)) {
        return candidate;
      }
    }
    return null;
  }
}
