export interface TrackRef {
  artist: string;
  name: string;
}

export interface TrackInfo extends TrackRef {
  listeners: number;
  duration: number;
  playcount: number;
  url: string;
  /** Provider fields the core never reads (album, wiki, mbid, ...). */
  extras: Record<string, unknown>;
}

/**
 * Track metadata source. Every method rejects with ProviderError when the
 * lookup fails; nothing here retries.
 */
export interface TrackProvider {
  getTrackInfo(artist: string, track: string): Promise<TrackInfo>;
  /** Most similar first. */
  getSimilarArtists(artist: string, limit: number): Promise<string[]>;
  getTopTrack(artist: string): Promise<TrackRef>;
  /** `limit` is advisory; callers truncate. */
  getTopTags(artist: string, track: string, limit: number): Promise<string[]>;
}
