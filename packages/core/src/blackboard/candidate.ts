import type { Feedback, SourceKind } from '../types.js';
import type { TrackInfo } from '../provider/types.js';
import { trackKey } from '../utils.js';

/**
 * Anything that wants to hear how the user answered about a candidate.
 * Every knowledge source implements this; candidates hold references to it,
 * never to a concrete source class.
 */
export interface Notifiable {
  readonly kind: SourceKind;
  readonly name: string;
  onFeedback(candidate: Candidate, feedback: Feedback): Promise<void>;
}

export interface CandidateFields {
  artist: string;
  name: string;
  listeners?: number;
  duration?: number;
  playcount?: number;
  url?: string;
  tags?: string[];
  extras?: Record<string, unknown>;
}

/** A track under consideration. Identity is the (artist, name) pair. */
export class Candidate {
  readonly artist: string;
  readonly name: string;
  readonly listeners: number;
  readonly duration: number;
  readonly playcount: number;
  readonly url: string;
  readonly extras: Record<string, unknown>;
  /** Filled lazily by the tag matcher; undefined means "not fetched yet". */
  tags: string[] | undefined;

  private readonly subscriberList: Notifiable[] = [];

  constructor(
    readonly source: Notifiable,
    fields: CandidateFields,
  ) {
    this.artist = fields.artist;
    this.name = fields.name;
    this.listeners = fields.listeners ?? 0;
    this.duration = fields.duration ?? 0;
    this.playcount = fields.playcount ?? 0;
    this.url = fields.url ?? '';
    this.tags = fields.tags;
    this.extras = fields.extras ?? {};
  }

  static fromTrackInfo(source: Notifiable, info: TrackInfo): Candidate {
    return new Candidate(source, info);
  }

  get id(): string {
    return trackKey(this.artist, this.name);
  }

  get subscribers(): readonly Notifiable[] {
    return this.subscriberList;
  }

  subscribe(agent: Notifiable): void {
    if (!this.subscriberList.includes(agent)) this.subscriberList.push(agent);
  }

  unsubscribe(agent: Notifiable): void {
    const idx = this.subscriberList.indexOf(agent);
    if (idx !== -1) this.subscriberList.splice(idx, 1);
  }

  /** Drop every subscriber. Called once the candidate has left the pool for good. */
  detach(): void {
    this.subscriberList.length = 0;
  }

  /**
   * Deliver feedback to each subscriber in subscription order, one at a time.
   * Iterates a copy: a subscriber that unsubscribes mid-delivery does not
   * change who hears about this call.
   */
  async notify(feedback: Feedback): Promise<void> {
    for (const agent of [...this.subscriberList]) {
      await agent.onFeedback(this, feedback);
    }
  }

  describe(): string {
    let tags = 'not fetched';
    if (this.tags) {
      const more = this.tags.length - 3;
      tags = this.tags.slice(0, 3).join(', ') + (more > 0 ? ` (+${more} more)` : '');
    }
    return `${this.id}, listeners: ${this.listeners}, duration: ${this.duration}, playcount: ${this.playcount}, tags: ${tags}`;
  }
}
