/**
 * Last.fm 2.0 REST client.
 *
 * Every response is checked for Last.fm's in-body `error` field before it is
 * validated. Lists that Last.fm collapses to a bare object when they hold a
 * single entry are normalised back to arrays.
 */

import { z } from 'zod';
import { ProviderError } from '../errors.js';
import { ProviderConfigSchema, type ProviderConfig, type ProviderConfigInput } from '../types.js';
import type { TrackInfo, TrackProvider, TrackRef } from './types.js';

const count = z.coerce.number().catch(0);

const Named = z.object({ name: z.string() });
const NamedList = z
  .union([z.array(Named), Named])
  .transform((v) => (Array.isArray(v) ? v : [v]));

const TrackRefSchema = z.object({ name: z.string(), artist: Named });
const TrackRefList = z
  .union([z.array(TrackRefSchema), TrackRefSchema])
  .transform((v) => (Array.isArray(v) ? v : [v]));

const LastFmErrorSchema = z.object({ error: z.number(), message: z.string() });

const TrackInfoResponse = z.object({
  track: z
    .object({
      name: z.string(),
      artist: Named,
      listeners: count,
      duration: count,
      playcount: count,
      url: z.string().default(''),
    })
    .passthrough(),
});

const SimilarArtistsResponse = z.object({
  similarartists: z.object({ artist: NamedList.default([]) }),
});

const TopTracksResponse = z.object({
  toptracks: z.object({ track: TrackRefList.default([]) }),
});

const TopTagsResponse = z.object({
  toptags: z.object({ tag: NamedList.default([]) }),
});

type Params = Record<string, string | number>;

export class LastFmProvider implements TrackProvider {
  private readonly config: ProviderConfig;

  constructor(config: ProviderConfigInput) {
    this.config = ProviderConfigSchema.parse(config);
  }

  async getTrackInfo(artist: string, track: string): Promise<TrackInfo> {
    const json = await this.request('track.getInfo', { artist, track });
    const { name, artist: by, listeners, duration, playcount, url, ...extras } = this.parse(
      TrackInfoResponse,
      json,
      'track.getInfo',
    ).track;
    return { name, artist: by.name, listeners, duration, playcount, url, extras };
  }

  async getSimilarArtists(artist: string, limit: number): Promise<string[]> {
    const json = await this.request('artist.getSimilar', { artist, limit });
    return this.parse(SimilarArtistsResponse, json, 'artist.getSimilar').similarartists.artist.map((a) => a.name);
  }

  async getTopTrack(artist: string): Promise<TrackRef> {
    const json = await this.request('artist.getTopTracks', { artist, limit: 1 });
    const [top] = this.parse(TopTracksResponse, json, 'artist.getTopTracks').toptracks.track;
    if (!top) throw new ProviderError(`No top track for ${artist}`, 'artist.getTopTracks');
    return { artist: top.artist.name, name: top.name };
  }

  async getTopTags(artist: string, track: string, limit: number): Promise<string[]> {
    const json = await this.request('track.getTopTags', { artist, track, limit });
    return this.parse(TopTagsResponse, json, 'track.getTopTags').toptags.tag.map((t) => t.name);
  }

  private async request(method: string, params: Params): Promise<unknown> {
    const url = new URL(this.config.baseUrl);
    const query = new URLSearchParams({
      method,
      api_key: this.config.apiKey,
      autocorrect: '1',
      format: 'json',
    });
    for (const [key, value] of Object.entries(params)) query.set(key, String(value));
    url.search = query.toString();

    const resp = await fetch(url);
    if (!resp.ok) {
      const body = await resp.text().catch(() => '');
      throw new ProviderError(`Last.fm ${method} ${resp.status}: ${body.slice(0, 200)}`, method, resp.status);
    }

    const json: unknown = await resp.json();
    const failure = LastFmErrorSchema.safeParse(json);
    if (failure.success) {
      throw new ProviderError(
        `Last.fm ${method} error ${failure.data.error}: ${failure.data.message}`,
        method,
        resp.status,
      );
    }
    return json;
  }

  private parse<T extends z.ZodTypeAny>(schema: T, json: unknown, method: string): z.output<T> {
    const result = schema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid payload';
      throw new ProviderError(`Unexpected ${method} response (${where})`, method);
    }
    return result.data;
  }
}
