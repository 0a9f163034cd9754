import { describe, it, expect } from 'vitest';
import { KeyImageLedger } from '../src/keyImages.js';

const RESULT = { height: 3_200_010, spentAtomic: 1_500_120_000_000n, unspentAtomic: 499_880_000_000n };

describe('KeyImageLedger', () => {
  it('is stale while a batch is unapplied', () => {
    const ledger = new KeyImageLedger('alice', { now: () => 5 });
    expect(ledger.isStale()).toBe(false);

    ledger.open('tx-1', 'broadcast');

    expect(ledger.isStale()).toBe(true);
    expect(ledger.get('tx-1')).toMatchObject({
      operatorId: 'alice',
      origin: 'broadcast',
      exportedAt: null,
      applied: false,
      openedAt: 5,
    });
  });

  it('opens a batch only once and learns its export time later', () => {
    const ledger = new KeyImageLedger('alice');
    const first = ledger.open('tx-1', 'broadcast');

    const again = ledger.open('tx-1', 'import', 1_700_000_000_000);

    expect(again).toBe(first);
    expect(first.origin).toBe('broadcast');
    expect(first.exportedAt).toBe(1_700_000_000_000);
    expect(ledger.unapplied()).toHaveLength(1);
  });

  it('applies a batch together with every earlier one', () => {
    const ledger = new KeyImageLedger('alice');
    ledger.open('tx-1', 'broadcast');
    ledger.open('tx-2', 'broadcast');
    ledger.open('tx-3', 'broadcast');

    const changed = ledger.markApplied('tx-2', RESULT);

    expect(changed.map((b) => b.batchId)).toEqual(['tx-1', 'tx-2']);
    expect(ledger.unapplied().map((b) => b.batchId)).toEqual(['tx-3']);
    expect(ledger.get('tx-1')?.result).toEqual(RESULT);
  });

  it('refuses to apply a batch it never opened', () => {
    const ledger = new KeyImageLedger('alice');

    expect(() => ledger.markApplied('tx-9', RESULT)).toThrow('Unknown key-image batch tx-9');
  });

  it('forgets the oldest applied batches beyond its history size', () => {
    const ledger = new KeyImageLedger('alice', { historySize: 2 });
    for (const id of ['tx-1', 'tx-2', 'tx-3']) {
      ledger.open(id, 'broadcast');
    }
    ledger.markApplied('tx-3', RESULT);

    expect(ledger.get('tx-1')).toBeUndefined();
    expect(ledger.get('tx-2')?.applied).toBe(true);
    expect(ledger.get('tx-3')?.applied).toBe(true);
    expect(ledger.isStale()).toBe(false);
  });

  it('lists only broadcast batches as waiting for spends', () => {
    const ledger = new KeyImageLedger('alice');
    ledger.open('tx-1', 'broadcast');
    ledger.open('ki-1', 'import');

    expect(ledger.awaitingSpends().map((b) => b.batchId)).toEqual(['tx-1']);
    expect(ledger.unapplied().map((b) => b.batchId)).toEqual(['tx-1', 'ki-1']);
  });
});
