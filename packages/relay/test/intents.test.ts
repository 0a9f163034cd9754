import { describe, it, expect } from 'vitest';
import { IllegalTransitionError, IntentBook, canTransition, isTerminal, type NewIntent } from '../src/intents.js';

const DEST = '4' + 'B'.repeat(94);

function newIntent(requestId: string): NewIntent {
  return { operatorId: 'alice', requestId, destination: DEST, amountAtomic: 1_500_000_000_000n, priority: 0 };
}

function book(opts: { archiveSize?: number } = {}) {
  let now = 1_000;
  const intents = new IntentBook({ ttlMs: 60_000, archiveSize: opts.archiveSize, now: () => now });
  return {
    intents,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('intent transitions', () => {
  it('only moves forward', () => {
    expect(canTransition('REQUESTED', 'UNSIGNED_READY')).toBe(true);
    expect(canTransition('SUBMITTED', 'CONFIRMED')).toBe(true);
    expect(canTransition('UNSIGNED_READY', 'REQUESTED')).toBe(false);
    expect(canTransition('REQUESTED', 'SIGNED')).toBe(false);
    expect(canTransition('CONFIRMED', 'FAILED')).toBe(false);
  });

  it('knows the terminal states', () => {
    expect(isTerminal('CONFIRMED')).toBe(true);
    expect(isTerminal('FAILED')).toBe(true);
    expect(isTerminal('EXPIRED')).toBe(true);
    expect(isTerminal('SUBMITTED')).toBe(false);
  });
});

describe('IntentBook', () => {
  it('opens an intent with its deadline', () => {
    const { intents } = book();

    const intent = intents.open(newIntent('tx-1'));

    expect(intent).toMatchObject({ state: 'REQUESTED', createdAt: 1_000, expiresAt: 61_000, txKey: null });
    expect(intents.get('tx-1')).toBe(intent);
    expect(intents.activeCount).toBe(1);
  });

  it('refuses a second intent for the same request id', () => {
    const { intents } = book();
    intents.open(newIntent('tx-1'));

    expect(() => intents.open(newIntent('tx-1'))).toThrow('Intent tx-1 already exists');
  });

  it('rejects an illegal transition and leaves the intent untouched', () => {
    const { intents } = book();
    const intent = intents.open(newIntent('tx-1'));

    expect(() => intents.transition(intent, 'SUBMITTED', { txHash: 'aa'.repeat(32) })).toThrow(IllegalTransitionError);
    expect(intent.state).toBe('REQUESTED');
    expect(intent.txHash).toBeNull();
  });

  it('archives terminal intents and still finds them', () => {
    const { intents } = book();
    const intent = intents.open(newIntent('tx-1'));

    intents.fail(intent, 'INSUFFICIENT_FUNDS', 'not enough money');

    expect(intents.activeCount).toBe(0);
    expect(intents.get('tx-1')).toMatchObject({
      state: 'FAILED',
      failure: { code: 'INSUFFICIENT_FUNDS', message: 'not enough money' },
    });
  });

  it('keeps only the newest archived intents', () => {
    const { intents } = book({ archiveSize: 2 });
    for (const id of ['tx-1', 'tx-2', 'tx-3']) {
      intents.fail(intents.open(newIntent(id)), 'CONSTRUCTION_ERROR', 'refused');
    }

    expect(intents.get('tx-1')).toBeUndefined();
    expect(intents.get('tx-2')?.state).toBe('FAILED');
    expect(intents.get('tx-3')?.state).toBe('FAILED');
  });

  it('discards an intent that never got an unsigned transaction', () => {
    const { intents } = book();
    const intent = intents.open(newIntent('tx-1'));

    intents.discard(intent);

    expect(intents.get('tx-1')).toBeUndefined();
    expect(intents.open(newIntent('tx-1')).state).toBe('REQUESTED');
  });

  it('expires unsigned intents at their deadline and drops the artifact', () => {
    const { intents, advance } = book();
    const waiting = intents.open(newIntent('tx-1'));
    intents.transition(waiting, 'UNSIGNED_READY', {
      unsigned: { unsignedTxset: 'ab', txKey: 'cd', amountAtomic: 1n, feeAtomic: 1n },
      txKey: 'cd',
    });
    const signed = intents.open(newIntent('tx-2'));
    intents.transition(signed, 'UNSIGNED_READY');
    intents.transition(signed, 'SIGNED');

    advance(59_999);
    expect(intents.expireDue()).toEqual([]);
    advance(1);
    const expired = intents.expireDue();

    expect(expired.map((i) => i.requestId)).toEqual(['tx-1']);
    expect(waiting.state).toBe('EXPIRED');
    expect(waiting.unsigned).toBeNull();
    expect(signed.state).toBe('SIGNED');
  });

  it('lists intents by state', () => {
    const { intents } = book();
    const a = intents.open(newIntent('tx-1'));
    intents.open(newIntent('tx-2'));
    intents.transition(a, 'UNSIGNED_READY');

    expect(intents.inState('REQUESTED').map((i) => i.requestId)).toEqual(['tx-2']);
    expect(intents.inState('UNSIGNED_READY')).toEqual([a]);
  });
});
