/**
 * Relay node on an in-memory mesh with a mock wallet engine, and a bare
 * endpoint playing the operator.
 */

import {
  createMemoryMesh,
  ReliableEndpoint,
  type BackoffPolicy,
  type MemoryMesh,
  type ProvisionAck,
  type StatusMessage,
} from '@coldmesh/protocol';
import { MockChain, MockSigningWallet, MockWalletHost, type MockViewWallet } from '@coldmesh/wallet-mock';
import { startRelayNode, type RelayNode, type RelayNodeConfig } from '../src/node.js';
import { MemorySessionStore, type SessionStore } from '../src/sessionStore.js';

export const ALICE_ADDRESS = '4' + 'A'.repeat(94);
export const DEST = '4' + 'B'.repeat(94);
export const VIEW_KEY = 'ab'.repeat(32);
export const START_TIME = 1_700_000_000_000;

export const FAST_RETRY: BackoffPolicy = {
  baseDelayMs: 20,
  factor: 2,
  jitterRatio: 0,
  maxDelayMs: 80,
  maxAttempts: 4,
};

export const TEST_CONFIG: RelayNodeConfig = {
  mtu: 200,
  retry: FAST_RETRY,
  reassemblyTimeoutMs: 600_000,
  replayTtlMs: 86_400_000,
  replayMaxEntries: 1_000,
  intentTtlMs: 1_800_000,
  intentSweepMs: 3_600_000,
  intentArchiveSize: 100,
  confirmations: 10,
  confirmationPollMs: 3_600_000,
};

export interface Clock {
  ms: number;
  now(): number;
  advance(ms: number): void;
}

export function testClock(start = START_TIME): Clock {
  const clock: Clock = {
    ms: start,
    now: () => clock.ms,
    advance: (ms) => {
      clock.ms += ms;
    },
  };
  return clock;
}

export interface Harness {
  mesh: MemoryMesh;
  clock: Clock;
  host: MockWalletHost;
  node: RelayNode;
  client: ReliableEndpoint;
  signer: MockSigningWallet;
  statuses: StatusMessage[];
  close(): Promise<void>;
}

export interface HarnessOptions {
  config?: Partial<RelayNodeConfig>;
  store?: SessionStore;
  host?: MockWalletHost;
  clock?: Clock;
}

export async function startHarness(opts: HarnessOptions = {}): Promise<Harness> {
  const clock = opts.clock ?? testClock();
  const config: RelayNodeConfig = { ...TEST_CONFIG, ...opts.config };
  const mesh = createMemoryMesh({ mtu: config.mtu });
  const host = opts.host ?? new MockWalletHost({ chain: new MockChain(3_200_000, clock.now) });

  const node = await startRelayNode({
    config,
    transport: mesh.node('relay'),
    host,
    store: opts.store ?? new MemorySessionStore(),
    now: clock.now,
  });

  const client = new ReliableEndpoint({
    transport: mesh.node('alice-radio'),
    mtu: config.mtu,
    retry: FAST_RETRY,
    reassemblyTimeoutMs: 600_000,
    replayTtlMs: 86_400_000,
    replayMaxEntries: 1_000,
    now: clock.now,
  });
  const statuses: StatusMessage[] = [];
  client.onStatus((status) => statuses.push(status));

  return {
    mesh,
    clock,
    host,
    node,
    client,
    signer: new MockSigningWallet(),
    statuses,
    close: async () => {
      await client.close();
      await node.close();
    },
  };
}

/** Provision alice's view-only wallet "alice-view", wait for its scan and fund it */
export async function provisionAlice(h: Harness, fundsAtomic = 2_000_000_000_000n): Promise<MockViewWallet> {
  const ack: ProvisionAck = await h.client.request('relay', {
    kind: 'provision_wallet',
    operatorId: 'alice',
    requestId: 'prov-1',
    viewKey: VIEW_KEY,
    walletAddress: ALICE_ADDRESS,
    restoreHeight: 3_100_000,
    walletName: 'alice-view',
  });
  if (!ack.success) {
    throw new Error(`provisioning failed: ${ack.status}`);
  }
  await h.node.router.settled();
  const wallet = h.host.wallet('alice-view');
  if (fundsAtomic > 0n) {
    wallet.deposit(fundsAtomic);
  }
  return wallet;
}
