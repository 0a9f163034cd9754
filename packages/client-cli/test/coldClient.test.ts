import { describe, it, expect, afterEach } from 'vitest';
import {
  createLogger,
  ReliableEndpoint,
  type LogLevel,
  type StatusMessage,
} from '@coldmesh/protocol';
import { WalletEngineError } from '@coldmesh/wallet-rpc';
import { DEST, provisionAlice, startClientHarness, type ClientHarness } from './harness.js';

const harnesses: ClientHarness[] = [];

async function setup(opts: Parameters<typeof startClientHarness>[0] = {}): Promise<ClientHarness> {
  const h = await startClientHarness(opts);
  harnesses.push(h);
  return h;
}

afterEach(async () => {
  for (const h of harnesses.splice(0)) {
    await h.close();
  }
});

describe('ColdClient', () => {
  it('names requests by prefix, time and counter', async () => {
    const h = await setup();

    expect(h.client.nextRequestId('tx')).toBe('tx-loyw3v28-1');
    expect(h.client.nextRequestId('bal')).toBe('bal-loyw3v28-2');
  });

  it('provisions and reads the balance', async () => {
    const h = await setup();
    await provisionAlice(h);

    const balance = await h.client.getBalance();

    expect(balance).toEqual({
      kind: 'balance_response',
      operatorId: 'alice',
      requestId: 'bal-loyw3v28-2',
      balance: '2',
      unlockedBalance: '2',
      balanceAtomic: '2000000000000',
      unlockedAtomic: '2000000000000',
      syncHeight: 3_200_000,
      blocksToUnlock: 0,
    });
  });

  it('runs a full send and hands the key images back', async () => {
    const h = await setup();
    const wallet = await provisionAlice(h);

    const outcome = await h.client.send(DEST, '1.5');

    expect(h.signer.outputsImported).toBe(1);
    expect(outcome.unsigned).toMatchObject({
      requestId: 'tx-loyw3v28-3',
      fee: '0.00012',
      total: '1.50012',
      change: '0.49988',
    });
    expect(outcome.result).toMatchObject({
      kind: 'transaction_result',
      requestId: 'tx-loyw3v28-3',
      txKey: outcome.unsigned.txKey,
      fee: '0.00012',
      status: 'broadcast',
    });
    expect(outcome.keyImages).toEqual({
      kind: 'key_images_applied',
      operatorId: 'alice',
      requestId: 'ki-loyw3v28-4',
      batchId: 'tx-loyw3v28-3',
      height: 3_200_000,
      spent: '1.50012',
      unspent: '0.49988',
    });
    expect(wallet.calls.count('submitSigned')).toBe(1);
    expect((await h.client.getBalance()).balance).toBe('0.49988');
  });

  it('logs a failed key-image handover and leaves it to sync', async () => {
    const lines: Array<[LogLevel, string]> = [];
    const h = await setup({ logger: createLogger('client', { sink: (level, line) => lines.push([level, line]) }) });
    const wallet = await provisionAlice(h);
    wallet.calls.failNext(
      'importKeyImages',
      new WalletEngineError('unavailable', 'connect ECONNREFUSED 127.0.0.1:18082', { method: 'import_key_images' }),
    );

    const outcome = await h.client.send(DEST, '1.5');

    expect(outcome.result.status).toBe('broadcast');
    expect(outcome.keyImages).toBeNull();
    const warnings = lines.filter(([level]) => level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.[1]).toContain('key_image_sync_failed');
    await expect(h.client.getBalance()).rejects.toMatchObject({ code: 'STALE_BALANCE' });

    const applied = await h.client.syncKeyImages();

    expect(applied).toMatchObject({ batchId: 'ki-loyw3v28-6', requestId: 'ki-loyw3v28-7', unspent: '0.49988' });
    expect(wallet.keyImagesImported).toBe(1);
    expect((await h.client.getBalance()).balance).toBe('0.49988');
  });

  it('cannot clear a failed handover with only the images not exported yet', async () => {
    const h = await setup();
    const wallet = await provisionAlice(h);
    wallet.calls.failNext(
      'importKeyImages',
      new WalletEngineError('unavailable', 'connect ECONNREFUSED 127.0.0.1:18082', { method: 'import_key_images' }),
    );
    await h.client.send(DEST, '1.5');

    await expect(h.client.syncKeyImages(undefined, false)).rejects.toMatchObject({
      code: 'STALE_BALANCE',
      message: 'Import carried no key images; balance stays stale until key images arrive for tx-loyw3v28-3',
    });
    await expect(h.client.getBalance()).rejects.toMatchObject({ code: 'STALE_BALANCE' });

    const applied = await h.client.syncKeyImages();

    expect(applied).toMatchObject({ batchId: 'ki-loyw3v28-8', requestId: 'ki-loyw3v28-9', spent: '1.50012' });
    expect(wallet.keyImagesImported).toBe(1);
    expect((await h.client.getBalance()).balance).toBe('0.49988');
  });

  it('lists the outgoing transfer ahead of the deposit', async () => {
    const h = await setup();
    await provisionAlice(h);
    await h.client.send(DEST, '1.5');

    const transfers = await h.client.history();

    expect(transfers).toHaveLength(2);
    expect(transfers[0]).toMatchObject({
      direction: 'out',
      amount: '1.5',
      fee: '0.00012',
      height: 0,
      confirmations: 0,
      counterparty: DEST,
    });
    expect(transfers[1]).toMatchObject({ direction: 'in', amount: '2', height: 3_200_000, confirmations: 1 });
  });

  it('surfaces relay errors as protocol errors', async () => {
    const h = await setup();

    await expect(h.client.getBalance()).rejects.toMatchObject({
      name: 'ProtocolError',
      code: 'UNAUTHORIZED',
      requestId: 'bal-loyw3v28-1',
    });
  });

  it('needs a signing wallet to send or sync', async () => {
    const h = await setup({ withSigner: false });

    await expect(h.client.send(DEST, '1')).rejects.toThrow('send needs a signing wallet');
    await expect(h.client.syncKeyImages()).rejects.toThrow('syncKeyImages needs a signing wallet');
  });

  it('passes on status pushes for its own operator only', async () => {
    const h = await setup();
    const seen: StatusMessage[] = [];
    h.client.onStatus((status) => seen.push(status));
    const other = new ReliableEndpoint({
      transport: h.mesh.node('other-relay'),
      mtu: 200,
      retry: { baseDelayMs: 20, factor: 2, jitterRatio: 0, maxDelayMs: 80, maxAttempts: 1 },
      reassemblyTimeoutMs: 600_000,
      replayTtlMs: 86_400_000,
      replayMaxEntries: 100,
    });
    const base = { kind: 'status' as const, event: 'scan_complete' as const, message: 'done', timestamp: 1 };

    await other.push('cold-1', { ...base, operatorId: 'bob', requestId: 'push-1' });
    await other.push('cold-1', { ...base, operatorId: 'alice', requestId: 'push-2' });
    await h.mesh.idle();
    await other.close();

    expect(seen.map((s) => s.requestId)).toEqual(['push-2']);
  });
});
