/**
 * Relay Node
 *
 * Wires one mesh transport and one wallet host into a serving relay:
 * reliable endpoint, operator sessions, cold-signing flow, status pushes,
 * the confirmation watcher and the intent-expiry sweep.
 */

import { ReliableEndpoint, describeError, silentLogger, type Logger, type MeshTransport } from '@coldmesh/protocol';
import type { WalletHost } from '@coldmesh/wallet-rpc';
import { formatXmr } from '@coldmesh/wallet-rpc';
import { ColdSigning } from './coldSigning.js';
import type { RelayConfig } from './config.js';
import { StatusNotifier } from './notifier.js';
import { RelayRouter } from './router.js';
import type { SessionStore } from './sessionStore.js';
import { SessionRegistry } from './sessions.js';
import { ConfirmationWatcher } from './watcher.js';

export type RelayNodeConfig = Pick<
  RelayConfig,
  | 'mtu'
  | 'retry'
  | 'reassemblyTimeoutMs'
  | 'replayTtlMs'
  | 'replayMaxEntries'
  | 'intentTtlMs'
  | 'intentSweepMs'
  | 'intentArchiveSize'
  | 'confirmations'
  | 'confirmationPollMs'
>;

export interface RelayNodeOptions {
  config: RelayNodeConfig;
  transport: MeshTransport;
  host: WalletHost;
  store?: SessionStore;
  logger?: Logger;
  now?: () => number;
  random?: () => number;
}

export interface RelayNode {
  readonly endpoint: ReliableEndpoint;
  readonly registry: SessionRegistry;
  readonly router: RelayRouter;
  readonly watcher: ConfirmationWatcher;
  /** Expire overdue intents now; returns how many expired */
  sweepIntents(): Promise<number>;
  close(): Promise<void>;
}

export async function startRelayNode(opts: RelayNodeOptions): Promise<RelayNode> {
  const { config, transport, host } = opts;
  const logger = opts.logger ?? silentLogger;
  const now = opts.now ?? Date.now;

  const endpoint = new ReliableEndpoint({
    transport,
    mtu: config.mtu,
    retry: config.retry,
    reassemblyTimeoutMs: config.reassemblyTimeoutMs,
    replayTtlMs: config.replayTtlMs,
    replayMaxEntries: config.replayMaxEntries,
    now,
    random: opts.random,
    logger: logger.child('endpoint'),
  });

  const registry = new SessionRegistry({
    host,
    intentTtlMs: config.intentTtlMs,
    archiveSize: config.intentArchiveSize,
    store: opts.store,
    now,
    logger: logger.child('sessions'),
  });
  await registry.restore();

  const notifier = new StatusNotifier(endpoint, now, logger.child('status'));
  const coldSigning = new ColdSigning({ notifier, logger: logger.child('signing') });
  const router = new RelayRouter({ registry, coldSigning, notifier, now, logger: logger.child('router') });
  endpoint.serve(router.handle);

  const watcher = new ConfirmationWatcher({
    registry,
    notifier,
    confirmations: config.confirmations,
    pollMs: config.confirmationPollMs,
    logger: logger.child('watcher'),
  });
  watcher.start();

  const sweepIntents = async (): Promise<number> => {
    let expired = 0;
    for (const session of registry.all()) {
      const due = await session.queue.run(async () => session.intents.expireDue());
      for (const intent of due) {
        expired++;
        logger.info('intent_expired', { operatorId: session.operatorId, requestId: intent.requestId });
        notifier.notify(session, 'intent_expired', `Transaction request ${intent.requestId} expired unsigned`, {
          amount: formatXmr(intent.amountAtomic),
        });
      }
    }
    return expired;
  };

  const sweepTimer = setInterval(() => {
    sweepIntents().catch((err) => logger.error('intent_sweep_failed', { error: describeError(err) }));
  }, config.intentSweepMs);
  sweepTimer.unref();

  logger.info('relay_started', { address: transport.address, operators: registry.size, mtu: config.mtu });

  return {
    endpoint,
    registry,
    router,
    watcher,
    sweepIntents,
    close: async () => {
      clearInterval(sweepTimer);
      watcher.stop();
      await router.settled();
      await endpoint.close();
      await transport.close();
      logger.info('relay_stopped', {});
    },
  };
}
