export type { TrackInfo, TrackProvider, TrackRef } from './types.js';
export { LastFmProvider } from './lastfm.js';
