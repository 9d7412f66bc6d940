import { describe, it, expect } from 'vitest';
import { makeCandidate, seededBoard } from '../../__tests__/helpers.js';
import { PlaycountSource, applyFallback, rankByPlaycount } from '../playcount.js';

function setup(referencePlaycount: number, playcounts: number[]) {
  const { board, reference } = seededBoard({ artist: 'Seed', name: 'Song', playcount: referencePlaycount });
  const pool = playcounts.map((playcount, i) =>
    makeCandidate({ artist: `Artist ${i}`, name: `Track ${playcount}`, playcount }),
  );
  for (const candidate of pool) board.admit(candidate);
  return { board, reference, pool, source: new PlaycountSource(board) };
}

describe('rankByPlaycount', () => {
  it('fills every bucket in one pass', () => {
    const { pool } = setup(100, [90, 150, 200]);
    const b = rankByPlaycount(pool, 100);

    expect(b.closest.candidate?.playcount).toBe(90);
    expect(b.closest.score).toBe(90);
    expect(b['a-lot-more'].candidate?.playcount).toBe(200);
    expect(b['a-lot-more'].score).toBe(100);
    expect(b.more.candidate?.playcount).toBe(150);
    expect(b.more.score).toBe(50);
    expect(b['a-lot-fewer'].candidate?.playcount).toBe(90);
    expect(b['a-lot-fewer'].score).toBe(10);
    expect(b.fewer.candidate).toBeNull();
  });

  it('moves a displaced closest into the bucket on its side', () => {
    // 80 is closest until 105 arrives; 80 had fewer plays so it lands in "fewer".
    const { pool } = setup(100, [80, 105]);
    const b = rankByPlaycount(pool, 100);

    expect(b.closest.candidate?.playcount).toBe(105);
    expect(b.closest.score).toBe(95);
    expect(b.fewer.candidate?.playcount).toBe(80);
    expect(b.fewer.score).toBe(80);
  });

  it('treats a zero reference playcount as one', () => {
    const { pool } = setup(0, [3]);
    const b = rankByPlaycount(pool, 0);
    expect(b.closest.score).toBe(-200);
    expect(b['a-lot-more'].score).toBe(300);
  });
});

describe('applyFallback', () => {
  it('falls back from more to a-lot-more', () => {
    const { pool } = setup(100, [150]);
    const [strategy, bucket] = applyFallback('more', rankByPlaycount(pool, 100));
    expect(strategy).toBe('a-lot-more');
    expect(bucket.candidate?.playcount).toBe(150);
  });

  it('falls back to closest when both directional buckets are empty', () => {
    const { pool } = setup(100, [90, 80]);
    const [strategy, bucket] = applyFallback('a-lot-more', rankByPlaycount(pool, 100));
    expect(strategy).toBe('closest');
    expect(bucket.candidate?.playcount).toBe(90);
  });
});

describe('PlaycountSource', () => {
  it('picks the closest playcount by default', async () => {
    const { source } = setup(100, [90, 150, 200]);
    const pick = await source.choose();
    expect(pick?.candidate.playcount).toBe(90);
    expect(pick?.score).toBe(90);
    expect(source.strategy).toBe('closest');
  });

  it('picks the most extreme track under a-lot-more', async () => {
    const { source } = setup(100, [90, 150, 200]);
    source.useStrategy('a-lot-more');
    const pick = await source.choose();
    expect(pick?.candidate.playcount).toBe(200);
    expect(pick?.score).toBe(100);
  });

  it('settles on closest when a-lot-more and more have nothing', async () => {
    const { source } = setup(100, [90, 80]);
    source.useStrategy('a-lot-more');
    const pick = await source.choose();
    expect(pick?.candidate.playcount).toBe(90);
    expect(source.strategy).toBe('closest');
  });

  it('returns no result on an empty pool', async () => {
    const { board, source, pool } = setup(100, [90]);
    board.evict(pool[0]);
    expect(await source.choose()).toBeNull();
  });

  it('records one retractable hypothesis named after the strategy', async () => {
    const { board, source } = setup(100, [90, 150]);
    await source.choose();
    await source.choose();
    source.useStrategy('a-lot-more');
    await source.choose();

    const held = board.hypotheses.filter((h) => h.source === source);
    expect(held).toHaveLength(1);
    expect(held[0]?.reason).toBe('Try a-lot-more');
    expect(held[0]?.candidate.playcount).toBe(150);
    expect(held[0]?.score).toBe(50);
  });

  it('withdraws its proposal when the pick is accepted', async () => {
    const { board, source, pool } = setup(100, [90]);
    await source.choose();
    expect(board.retractableBy(source)?.candidate).toBe(pool[0]);

    await source.onFeedback(pool[0], 'accepted');
    expect(board.retractableBy(source)).toBeUndefined();
  });

  it('withdraws its proposal once the pool is empty', async () => {
    const { board, source, pool } = setup(100, [90]);
    await source.choose();
    board.evict(pool[0]);

    expect(await source.choose()).toBeNull();
    expect(board.retractableBy(source)).toBeUndefined();
  });

  it('boosts scores after an acceptance', async () => {
    const { source, pool } = setup(100, [90]);
    await source.onFeedback(pool[0], 'accepted');
    const pick = await source.choose();
    expect(source.quality).toBe('GOOD');
    expect(pick?.score).toBe(112.5);
  });

  it('escalates toward more plays after rejecting a quieter track', async () => {
    const { board, source, pool } = setup(100, [90, 150]);
    await source.choose();
    await source.onFeedback(pool[0], 'rejected');

    expect(board.retractableBy(source)).toBeUndefined();
    expect(source.strategy).toBe('a-lot-more');
    expect(source.pending.more).toEqual(['more']);
    expect(source.pending.fewer).toEqual(['fewer', 'a-lot-fewer']);

    await source.onFeedback(pool[0], 'rejected');
    expect(source.strategy).toBe('more');
  });

  it('escalates toward fewer plays after rejecting a louder track', async () => {
    const { source, pool } = setup(100, [150]);
    await source.onFeedback(pool[0], 'rejected');
    expect(source.strategy).toBe('a-lot-fewer');
  });

  it('marks itself POOR once a direction runs dry', async () => {
    const { board, source, pool } = setup(100, [90]);
    const quiet = pool[0];
    await source.onFeedback(quiet, 'rejected');
    await source.onFeedback(quiet, 'rejected');
    await source.onFeedback(quiet, 'rejected');

    expect(source.strategy).toBeNull();
    expect(source.quality).toBe('POOR');
    expect(source.pending.more).toEqual(['more', 'a-lot-more']);
    expect(board.activity.ofType('strategy_exhausted')).toHaveLength(1);

    const pick = await source.choose();
    expect(source.strategy).toBe('closest');
    expect(pick?.score).toBe(67.5);
  });

  it('resets its strategy queues on acceptance', async () => {
    const { source, pool } = setup(100, [90]);
    await source.onFeedback(pool[0], 'rejected');
    await source.onFeedback(pool[0], 'accepted');
    expect(source.pending.more).toEqual(['more', 'a-lot-more']);
    expect(source.strategy).toBe('a-lot-more');
  });
});
