/**
 * Collection tests
 *
 * 1. The gate: not_targeted, out_of_range, locked, already_collected
 * 2. Racing collectors on one coin: one winner, one credit
 * 3. Crediting happens after removal; a failed credit never restores the coin
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Cents, Coin } from '@coinquest/shared';
import {
  attemptCollect,
  CoinPool,
  CollectionDeniedError,
  CollectionService,
  createProximityConfig,
  CreditFailedError,
  denialMessage,
  describeResult,
  HuntError,
  InMemoryWallet,
  ProximityEngine,
  type WalletCreditor,
} from '../src';
import { coinAt, east, ORIGIN, recordEvents } from './helpers';

const config = createProximityConfig({ collectDistance: 5, nearDistance: 50, trackingRadius: 100 });

class FailingWallet implements WalletCreditor {
  async credit(_coin: Coin, _amount: Cents): Promise<void> {
    throw new Error('ledger offline');
  }
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('attemptCollect', () => {
  it('denies without a target', () => {
    const result = attemptCollect({ kind: 'no_target' }, new CoinPool(), 100);
    expect(result).toEqual({ status: 'denied', reason: 'not_targeted', message: 'No coin targeted' });
  });

  it('denies out of range with the distance', () => {
    const pool = new CoinPool([coinAt('c1', east(20))]);
    const engine = new ProximityEngine(config);
    engine.update(ORIGIN, null, pool, 100);

    const result = attemptCollect(engine.getState(), pool, 100);
    expect(result).toEqual({ status: 'denied', reason: 'out_of_range', message: 'Get closer! 20m away' });
    expect(pool.has('c1')).toBe(true);
  });

  it('always locks a coin above the find limit', () => {
    const pool = new CoinPool([coinAt('rich', east(2), 1001)]);
    const engine = new ProximityEngine(config);
    engine.update(ORIGIN, null, pool, 1000);

    for (let i = 0; i < 3; i++) {
      const result = attemptCollect(engine.getState(), pool, 1000);
      expect(result.status === 'denied' && result.reason).toBe('locked');
    }
    expect(pool.has('rich')).toBe(true);
  });

  it('uses the find limit at collect time, not the one from the last tick', () => {
    const pool = new CoinPool([coinAt('c1', east(2), 1500)]);
    const engine = new ProximityEngine(config);
    engine.update(ORIGIN, null, pool, 2000);
    expect(engine.isLocked).toBe(false);

    const result = attemptCollect(engine.getState(), pool, 1000);
    expect(result).toEqual({
      status: 'denied',
      reason: 'locked',
      message: 'This treasure be $15.00, but yer limit is only $10.00! Hide a $15.00 coin to unlock finds up to $15.00.',
    });
  });

  it('collects at exactly the find limit and reports already_collected afterwards', () => {
    const pool = new CoinPool([coinAt('c1', east(2), 1000)]);
    const engine = new ProximityEngine(config);
    engine.update(ORIGIN, null, pool, 1000);
    const state = engine.getState();

    const first = attemptCollect(state, pool, 1000);
    const second = attemptCollect(state, pool, 1000);

    expect(first.status === 'collected' && first.creditedValue).toBe(1000);
    expect(second).toEqual({
      status: 'denied',
      reason: 'already_collected',
      message: 'This coin is no longer available',
    });
    expect(pool.removalReason('c1')).toBe('collected');
  });
});

describe('denialMessage', () => {
  it('falls back to generic copy without context', () => {
    expect(denialMessage('out_of_range')).toBe('Get closer to collect');
    expect(denialMessage('locked')).toBe('This treasure be above yer limit, matey!');
    expect(denialMessage('locked', { coinValue: 250, findLimit: 100 })).toBe(
      'This treasure be $2.50, but yer limit is only $1.00! Hide a $2.50 coin to unlock finds up to $2.50.',
    );
  });
});

describe('CollectionService', () => {
  it('credits the wallet once and notifies the engine', async () => {
    const pool = new CoinPool([coinAt('c1', east(2), 250)]);
    const engine = new ProximityEngine(config);
    const wallet = new InMemoryWallet();
    const service = new CollectionService(engine, pool, wallet);
    engine.update(ORIGIN, null, pool, 1000);
    const events = recordEvents(engine);

    const result = await service.collect(1000);

    expect(result.status).toBe('collected');
    expect(describeResult(result)).toBe('c1 collected for $2.50');
    expect(wallet.pendingBalance).toBe(250);
    expect(wallet.hasCredited('c1')).toBe(true);
    expect(engine.hasTarget).toBe(false);
    expect(events).toEqual(['target:collected c1 250', 'zone:changed collectible->out_of_range']);
  });

  it('lets exactly one of two racing collectors win', async () => {
    const pool = new CoinPool([coinAt('c1', east(2), 300)]);
    const wallet = new InMemoryWallet();
    const alice = new ProximityEngine(config);
    const bob = new ProximityEngine(config);
    alice.update(ORIGIN, null, pool, 1000);
    bob.update(east(1), null, pool, 1000);

    const results = await Promise.all([
      new CollectionService(alice, pool, wallet).collect(1000),
      new CollectionService(bob, pool, wallet).collect(1000),
    ]);

    expect(results.map((r) => r.status).sort()).toEqual(['collected', 'denied']);
    const loser = results.find((r) => r.status === 'denied');
    expect(loser?.status === 'denied' && loser.reason).toBe('already_collected');
    expect(wallet.pendingBalance).toBe(300);
    expect(wallet.entries()).toHaveLength(1);

    // the loser's engine notices on its next tick
    bob.update(east(1), null, pool, 1000);
    expect(bob.hasTarget).toBe(false);
    expect(bob.invariantViolations).toHaveLength(0);
  });

  it('surfaces a failed credit without putting the coin back', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const pool = new CoinPool([coinAt('c1', east(2), 400)]);
    const engine = new ProximityEngine(config);
    const service = new CollectionService(engine, pool, new FailingWallet());
    engine.update(ORIGIN, null, pool, 1000);

    const attempt = service.collect(1000);
    await expect(attempt).rejects.toBeInstanceOf(CreditFailedError);
    await expect(attempt).rejects.toThrow('Coin c1 was collected but the credit failed: ledger offline');

    expect(pool.has('c1')).toBe(false);
    expect(pool.wasRemoved('c1')).toBe(true);
    expect(engine.hasTarget).toBe(false);
    expect(error).toHaveBeenCalledWith('[Collection] Credit of $4.00 for c1 failed: ledger offline');
  });

  it('collects without a wallet', async () => {
    const pool = new CoinPool([coinAt('c1', east(2), 50)]);
    const engine = new ProximityEngine(config);
    engine.update(ORIGIN, null, pool, 100);

    const result = await new CollectionService(engine, pool).collect(100);
    expect(result.status === 'collected' && result.creditedValue).toBe(50);
  });

  it('assertCollected throws the denial', async () => {
    const pool = new CoinPool([coinAt('c1', east(20))]);
    const engine = new ProximityEngine(config);
    engine.update(ORIGIN, null, pool, 100);

    const attempt = new CollectionService(engine, pool).assertCollected(100);
    await expect(attempt).rejects.toBeInstanceOf(CollectionDeniedError);
    await expect(attempt).rejects.toMatchObject({ reason: 'out_of_range', code: 'COLLECTION_DENIED' });
  });
});

describe('InMemoryWallet', () => {
  const coin = coinAt('c1', east(1), 75);

  it('records a ledger entry per coin', async () => {
    const wallet = new InMemoryWallet(() => new Date('2026-01-01T00:00:00.000Z'));
    await wallet.credit(coin, 75);

    expect(wallet.entries()).toEqual([{ coinId: 'c1', amount: 75, creditedAt: '2026-01-01T00:00:00.000Z' }]);
  });

  it('refuses to credit the same coin twice', async () => {
    const wallet = new InMemoryWallet();
    await wallet.credit(coin, 75);

    await expect(wallet.credit(coin, 75)).rejects.toMatchObject({ code: 'DUPLICATE_CREDIT' });
    expect(wallet.pendingBalance).toBe(75);
  });

  it('rejects invalid amounts', async () => {
    const wallet = new InMemoryWallet();
    await expect(wallet.credit(coin, -5)).rejects.toBeInstanceOf(HuntError);
    expect(wallet.pendingBalance).toBe(0);
  });
});
