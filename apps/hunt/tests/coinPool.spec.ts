/**
 * CoinPool tests
 *
 * 1. nearest() is deterministic on ties and inclusive at the radius
 * 2. remove() has exactly one winner and leaves a tombstone
 * 3. A coin object belongs to at most one pool
 */

import { describe, expect, it } from 'vitest';
import { distanceMeters } from '@coinquest/shared';
import { CoinPool, CoinPoolError, InputRejectedError } from '../src';
import { coinAt, east, ORIGIN } from './helpers';

describe('CoinPool.nearest', () => {
  it('breaks exact distance ties by the lower id', () => {
    const pool = new CoinPool([coinAt('b', east(10)), coinAt('a', east(-10))]);
    expect(pool.nearest(ORIGIN, 100)?.id).toBe('a');

    const reversed = new CoinPool([coinAt('a', east(-10)), coinAt('b', east(10))]);
    expect(reversed.nearest(ORIGIN, 100)?.id).toBe('a');
  });

  it('picks the closest coin', () => {
    const pool = new CoinPool([coinAt('far', east(40)), coinAt('close', east(-15)), coinAt('mid', east(20))]);
    expect(pool.nearest(ORIGIN, 100)?.id).toBe('close');
  });

  it('treats maxRadius as inclusive', () => {
    const coin = coinAt('edge', east(30));
    const pool = new CoinPool([coin]);
    const d = distanceMeters(ORIGIN, coin.position);

    expect(pool.nearest(ORIGIN, d)?.id).toBe('edge');
    expect(pool.nearest(ORIGIN, d - 0.001)).toBeUndefined();
  });

  it('returns undefined for an empty pool', () => {
    expect(new CoinPool().nearest(ORIGIN, 1000)).toBeUndefined();
  });

  it('rejects malformed queries', () => {
    const pool = new CoinPool([coinAt('a', east(1))]);
    expect(() => pool.nearest({ latitude: 91, longitude: 0 }, 10)).toThrow(InputRejectedError);
    expect(() => pool.nearest(ORIGIN, -1)).toThrow(InputRejectedError);
  });
});

describe('CoinPool.within', () => {
  it('lists coins inside the radius, nearest first', () => {
    const pool = new CoinPool([coinAt('c', east(30)), coinAt('a', east(10)), coinAt('b', east(-20)), coinAt('z', east(90))]);
    const hits = pool.within(ORIGIN, 50);
    expect(hits.map((h) => h.coin.id)).toEqual(['a', 'b', 'c']);
    expect(hits[0].distance).toBeCloseTo(10, 6);
  });
});

describe('CoinPool.remove', () => {
  it('has exactly one winner per coin', () => {
    const pool = new CoinPool([coinAt('a', east(5))]);
    expect(pool.remove('a')).toBe(true);
    expect(pool.remove('a')).toBe(false);
    expect(pool.has('a')).toBe(false);
    expect(pool.size).toBe(0);
  });

  it('remembers why a coin left', () => {
    const pool = new CoinPool([coinAt('a', east(5)), coinAt('b', east(6))]);
    pool.remove('a', 'expired');

    expect(pool.wasRemoved('a')).toBe(true);
    expect(pool.removalReason('a')).toBe('expired');
    expect(pool.wasRemoved('b')).toBe(false);
    expect(pool.removalReason('b')).toBeUndefined();
  });

  it('returns false for ids it never held', () => {
    expect(new CoinPool().remove('ghost')).toBe(false);
  });
});

describe('CoinPool.add', () => {
  it('freezes coins it accepts', () => {
    const coin = coinAt('a', east(5));
    new CoinPool([coin]);
    expect(Object.isFrozen(coin)).toBe(true);
    expect(Object.isFrozen(coin.position)).toBe(true);
  });

  it('refuses a duplicate id, including one already removed', () => {
    const pool = new CoinPool([coinAt('a', east(5))]);
    expect(() => pool.add(coinAt('a', east(7)))).toThrow(CoinPoolError);

    pool.remove('a');
    try {
      pool.add(coinAt('a', east(7)));
      expect.unreachable('re-adding a removed id should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(CoinPoolError);
      expect(err instanceof CoinPoolError && err.code).toBe('DUPLICATE_COIN');
    }
  });

  it('refuses a coin object placed in another pool, even after it was collected there', () => {
    const coin = coinAt('shared', east(5));
    const first = new CoinPool([coin]);
    const second = new CoinPool();

    expect(() => second.add(coin)).toThrow(/another pool/);

    first.remove('shared');
    expect(() => second.add(coin)).toThrow(/another pool/);
    expect(second.has('shared')).toBe(false);
  });

  it('rejects coins with invalid values or positions', () => {
    const pool = new CoinPool();
    expect(() => pool.add(coinAt('neg', east(1), -1))).toThrow(CoinPoolError);
    expect(() => pool.add(coinAt('frac', east(1), 1.5))).toThrow(CoinPoolError);
    expect(() => pool.add(coinAt('bad', { latitude: 100, longitude: 0 }))).toThrow(CoinPoolError);
    expect(() => pool.add(coinAt('', east(1)))).toThrow(CoinPoolError);
    expect(pool.size).toBe(0);
  });

  it('populate() adds nothing when any coin in the batch is rejected', () => {
    const pool = new CoinPool([coinAt('x', east(9))]);

    expect(() => pool.populate([coinAt('a', east(1)), coinAt('bad', { latitude: 999, longitude: 0 })])).toThrow(
      CoinPoolError,
    );
    expect(() => pool.populate([coinAt('b', east(1)), coinAt('x', east(2))])).toThrow(/already known/);
    expect(() => pool.populate([coinAt('c', east(1)), coinAt('c', east(2))])).toThrow(/already known/);
    expect(pool.list().map((c) => c.id)).toEqual(['x']);
  });

  it('populate() reports how many coins were added', () => {
    const pool = new CoinPool();
    expect(pool.populate([coinAt('a', east(1)), coinAt('b', east(2))])).toBe(2);
    expect(pool.list().map((c) => c.id)).toEqual(['a', 'b']);
  });
});

describe('CoinPool.clear', () => {
  it('forgets coins and tombstones', () => {
    const pool = new CoinPool([coinAt('a', east(1)), coinAt('b', east(2))]);
    pool.remove('a');
    pool.clear();

    expect(pool.size).toBe(0);
    expect(pool.wasRemoved('a')).toBe(false);
    pool.add(coinAt('a', east(1)));
    expect(pool.has('a')).toBe(true);
  });
});
