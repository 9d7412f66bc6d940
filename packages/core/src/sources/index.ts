export type { KnowledgeSource, ScoredPick, ScoringSource } from './types.js';
export { SeedSource } from './seed.js';
export { GatherSource, type GatherOptions } from './gather.js';
export { TagMatchSource } from './tag-match.js';
export { PlaycountSource, rankByPlaycount, applyFallback, type Bucket, type Buckets } from './playcount.js';
export { proposeOnce, resignCurrent } from './bookkeeping.js';
