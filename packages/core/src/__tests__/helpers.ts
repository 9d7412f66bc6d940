/**
 * In-process stand-ins shared by the core tests: a scripted track provider,
 * a no-op knowledge source, and a blackboard pre-loaded with a reference track.
 */

import { vi } from 'vitest';
import { Candidate, type CandidateFields, type Notifiable } from '../blackboard/candidate.js';
import { createAssertion } from '../blackboard/hypothesis.js';
import { Workspace } from '../blackboard/workspace.js';
import { ProviderError } from '../errors.js';
import type { TrackInfo, TrackProvider, TrackRef } from '../provider/types.js';
import type { Feedback, SourceKind } from '../types.js';
import { trackKey } from '../utils.js';

export interface FakeTrack {
  artist: string;
  name: string;
  playcount?: number;
  listeners?: number;
  tags?: string[];
}

export class FakeProvider implements TrackProvider {
  readonly calls: string[] = [];
  private readonly tracks = new Map<string, FakeTrack>();
  private readonly similar = new Map<string, string[]>();
  private readonly topTracks = new Map<string, TrackRef>();
  private readonly corrections = new Map<string, TrackRef>();

  addTrack(track: FakeTrack): this {
    this.tracks.set(trackKey(track.artist, track.name), track);
    return this;
  }

  /** Register `artist`'s top track and add it as a known track. */
  addTopTrack(track: FakeTrack): this {
    this.topTracks.set(track.artist, { artist: track.artist, name: track.name });
    return this.addTrack(track);
  }

  /** Answer lookups of `typed` with `canonical`, the way Last.fm autocorrects. */
  correct(typed: TrackRef, canonical: TrackRef): this {
    this.corrections.set(trackKey(typed.artist, typed.name), canonical);
    return this;
  }

  setSimilar(artist: string, similar: string[]): this {
    this.similar.set(artist, similar);
    return this;
  }

  callsTo(method: string): string[] {
    return this.calls.filter((c) => c.startsWith(`${method}:`));
  }

  async getTrackInfo(artist: string, track: string): Promise<TrackInfo> {
    const key = trackKey(artist, track);
    this.calls.push(`getTrackInfo:${key}`);
    const corrected = this.corrections.get(key);
    const found = this.tracks.get(corrected ? trackKey(corrected.artist, corrected.name) : key);
    if (!found) throw new ProviderError(`Track not found: ${key}`, 'track.getInfo', 404);
    return {
      artist: found.artist,
      name: found.name,
      listeners: found.listeners ?? 0,
      duration: 180000,
      playcount: found.playcount ?? 0,
      url: `https://example.test/${encodeURIComponent(key)}`,
      extras: {},
    };
  }

  async getSimilarArtists(artist: string, limit: number): Promise<string[]> {
    this.calls.push(`getSimilarArtists:${artist}`);
    return (this.similar.get(artist) ?? []).slice(0, limit);
  }

  async getTopTrack(artist: string): Promise<TrackRef> {
    this.calls.push(`getTopTrack:${artist}`);
    const top = this.topTracks.get(artist);
    if (!top) throw new ProviderError(`No top track for ${artist}`, 'artist.getTopTracks');
    return top;
  }

  async getTopTags(artist: string, track: string, _limit: number): Promise<string[]> {
    const key = trackKey(artist, track);
    this.calls.push(`getTopTags:${key}`);
    return [...(this.tracks.get(key)?.tags ?? [])];
  }
}

export function stubSource(kind: SourceKind = 'gather', name = 'StubSource') {
  return {
    kind,
    name,
    onFeedback: vi.fn(async (_candidate: Candidate, _feedback: Feedback) => {}),
  } satisfies Notifiable;
}

export function makeCandidate(fields: CandidateFields, source: Notifiable = stubSource()): Candidate {
  return new Candidate(source, fields);
}

/** A blackboard whose `solving` reference is the given track. */
export function seededBoard(reference: CandidateFields): { board: Workspace; reference: Candidate } {
  const board = new Workspace();
  const source = stubSource('seed', 'SeedStub');
  const candidate = new Candidate(source, reference);
  const initial = createAssertion(candidate, source, 'initial');
  board.record(initial);
  board.setSolving(initial);
  return { board, reference: candidate };
}
