import type { Candidate, Notifiable } from '../blackboard/candidate.js';
import type { GatherSource } from './gather.js';
import type { PlaycountSource } from './playcount.js';
import type { SeedSource } from './seed.js';
import type { TagMatchSource } from './tag-match.js';

export interface ScoredPick {
  candidate: Candidate;
  score: number;
}

/** A source that can put forward its single best candidate with a score. */
export interface ScoringSource extends Notifiable {
  choose(): Promise<ScoredPick | null>;
}

export type KnowledgeSource = SeedSource | GatherSource | TagMatchSource | PlaycountSource;
