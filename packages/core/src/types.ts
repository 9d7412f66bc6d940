import { z } from 'zod';

// ── Constants ───────────────────────────────────────────────────

export const LASTFM_BASE_URL = 'https://ws.audioscrobbler.com/2.0/';

/** Last.fm ignores `limit` on track.getTopTags, so callers slice to this. */
export const MAX_TAGS = 19;

// ── Provider Config ─────────────────────────────────────────────

export const ProviderConfigSchema = z.object({
  apiKey: z.string().min(1, 'A Last.fm API key is required'),
  baseUrl: z.string().url().default(LASTFM_BASE_URL),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;

// ── Session Config ──────────────────────────────────────────────

export const SessionConfigSchema = z.object({
  initialCount: z.number().int().positive().default(4),
  refillCount: z.number().int().positive().default(1),
  similarLimit: z.number().int().positive().default(20),
  tagLimit: z.number().int().positive().max(MAX_TAGS).default(MAX_TAGS),
});

export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

// ── Feedback ────────────────────────────────────────────────────

export const Feedback = z.enum(['accepted', 'rejected']);
export type Feedback = z.infer<typeof Feedback>;

// ── Hypotheses ──────────────────────────────────────────────────

export const HypothesisKind = z.enum(['initial', 'liked', 'disliked', 'proposal']);
export type HypothesisKind = z.infer<typeof HypothesisKind>;

/** Kinds that describe ground truth and can never be retracted. */
export const PERMANENT_KINDS: readonly HypothesisKind[] = ['initial', 'liked', 'disliked'];

export const HYPOTHESIS_REASONS = {
  initial: 'Initial song',
  liked: 'Liked by user',
  disliked: 'Disliked by user',
} as const;

// ── Knowledge Sources ───────────────────────────────────────────

export type SourceKind = 'seed' | 'gather' | 'tag-match' | 'playcount-match';

export const PlaycountStrategy = z.enum(['closest', 'more', 'a-lot-more', 'fewer', 'a-lot-fewer']);
export type PlaycountStrategy = z.infer<typeof PlaycountStrategy>;

export type SourceQuality = 'GOOD' | 'POOR';
