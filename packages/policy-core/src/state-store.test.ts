import { describe, expect, it } from 'vitest';
import { InternalError } from './errors.js';
import { StateStore, fromUnits, stateKey, subjectKey, toUnits } from './state-store.js';

describe('subjectKey', () => {
  it('uses the first present attribute', () => {
    expect(subjectKey({ agent_id: 'a1', wallet_address: '0x1' })).toBe('agent_id=a1');
    expect(subjectKey({ wallet_address: '0x1', ip_address: '10.0.0.1' })).toBe('wallet_address=0x1');
    expect(subjectKey({ ip_address: '10.0.0.1' })).toBe('ip_address=10.0.0.1');
    expect(subjectKey({})).toBe('anonymous');
  });
});

describe('amount units', () => {
  it('sums decimal amounts exactly', () => {
    let units = 0;
    for (let i = 0; i < 10; i++) {
      units += toUnits(0.1);
    }
    expect(fromUnits(units)).toBe(1);
  });
});

describe('StateStore', () => {
  const key = stateKey('rate_limit-0', 'agent_id=a1');

  it('counts commits inside the window only', () => {
    const store = new StateStore();
    store.recordRequest(key, 60_000, 0);
    store.recordRequest(key, 60_000, 30_000);

    expect(store.peekRate(key, 60_000, 59_999)).toEqual({ count: 2, oldest: 0 });
    // A commit exactly one window ago is outside.
    expect(store.peekRate(key, 60_000, 60_000)).toEqual({ count: 1, oldest: 30_000 });
    expect(store.peekRate(key, 60_000, 90_000)).toEqual({ count: 0, oldest: undefined });
  });

  it('does not prune on peek', () => {
    const store = new StateStore();
    store.recordRequest(key, 1000, 0);
    store.peekRate(key, 1000, 5000);

    expect(store.snapshot().get(key)).toEqual({ kind: 'rate', timestamps: [0] });
  });

  it('prunes on record', () => {
    const store = new StateStore();
    store.recordRequest(key, 1000, 0);
    store.recordRequest(key, 1000, 500);
    store.recordRequest(key, 1000, 1200);

    expect(store.snapshot().get(key)).toEqual({ kind: 'rate', timestamps: [500, 1200] });
  });

  it('accumulates spending and resets expired windows on record', () => {
    const spendKey = stateKey('spending_cap-0', 'agent_id=a1');
    const store = new StateStore();
    store.recordSpending(spendKey, toUnits(1.5), 10_000, 0);
    store.recordSpending(spendKey, toUnits(2), 10_000, 10_000);

    expect(store.peekSpending(spendKey, 10_000, 10_000)).toBe(3_500_000);
    expect(store.peekSpending(spendKey, 10_000, 10_001)).toBe(0);

    store.recordSpending(spendKey, toUnits(0.25), 10_000, 10_001);

    expect(store.snapshot().get(spendKey)).toEqual({
      kind: 'spending',
      accumulatedUnits: 250_000,
      windowStart: 10_001,
    });
  });

  it('raises an internal error for a key holding the other kind of state', () => {
    const store = new StateStore();
    store.recordRequest(key, 1000, 0);

    expect(() => store.peekSpending(key, 1000, 0)).toThrow(InternalError);
  });

  it('returns copies from snapshot', () => {
    const store = new StateStore();
    store.recordRequest(key, 1000, 0);
    const snapshot = store.snapshot();
    store.recordRequest(key, 1000, 10);

    expect(snapshot.get(key)).toEqual({ kind: 'rate', timestamps: [0] });
    expect(store.size).toBe(1);
  });
});
