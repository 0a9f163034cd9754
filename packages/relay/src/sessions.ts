/**
 * Session Registry
 *
 * One session per provisioned operator. Sessions are created only by an
 * explicit provision_wallet and never removed; re-provisioning with the same
 * credential is a no-op, a changed credential replaces the session.
 *
 * Each operator has one serial queue for its whole lifetime. Everything that
 * touches the operator's wallet runs on it; different operators never wait
 * on each other.
 */

import { ProtocolError, SerialQueue, canonicalDigest, silentLogger, type Logger, type ProvisionWallet } from '@coldmesh/protocol';
import type { ViewWallet, WalletBalance, WalletHost } from '@coldmesh/wallet-rpc';
import { IntentBook } from './intents.js';
import { KeyImageLedger } from './keyImages.js';
import type { SessionStore, StoredOperator } from './sessionStore.js';

export type ScanState = 'IDLE' | 'SCANNING' | 'FAILED';

export interface CachedBalance {
  balance: WalletBalance;
  height: number;
  at: number;
}

export interface OperatorSession {
  readonly operatorId: string;
  /** Digest of view key and address; the key itself is not kept */
  readonly fingerprint: string;
  readonly walletName: string;
  readonly walletAddress: string;
  readonly restoreHeight: number;
  readonly wallet: ViewWallet;
  readonly queue: SerialQueue;
  readonly intents: IntentBook;
  readonly keyImages: KeyImageLedger;
  /** Last good reading, served while the engine is unreachable; cleared on every spend or import */
  balance: CachedBalance | null;
  /** Mesh address the operator last wrote from; status pushes go there */
  lastSeen: string | null;
  scan: ScanState;
  readonly provisionedAt: number;
}

export interface ProvisionOutcome {
  session: OperatorSession;
  /** false when the same credential was already provisioned */
  changed: boolean;
}

export interface SessionRegistryOptions {
  host: WalletHost;
  intentTtlMs: number;
  archiveSize?: number;
  store?: SessionStore;
  now?: () => number;
  logger?: Logger;
}

export function credentialFingerprint(viewKey: string, walletAddress: string): string {
  return canonicalDigest({ viewKey, walletAddress });
}

/** Wallet file name for an operator's credential; stable across re-provisioning */
export function walletNameFor(operatorId: string, fingerprint: string): string {
  return `viewonly_${operatorId}_${fingerprint.slice(0, 12)}`;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, OperatorSession>();
  private readonly queues = new Map<string, SerialQueue>();
  private readonly host: WalletHost;
  private readonly opts: SessionRegistryOptions;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(opts: SessionRegistryOptions) {
    this.opts = opts;
    this.host = opts.host;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? silentLogger;
  }

  get size(): number {
    return this.sessions.size;
  }

  get(operatorId: string): OperatorSession | undefined {
    return this.sessions.get(operatorId);
  }

  all(): OperatorSession[] {
    return [...this.sessions.values()];
  }

  /** Session of a provisioned operator, or UNAUTHORIZED */
  require(operatorId: string, requestId: string): OperatorSession {
    const session = this.sessions.get(operatorId);
    if (!session) {
      throw new ProtocolError('UNAUTHORIZED', `Operator ${operatorId} is not provisioned`, { operatorId, requestId });
    }
    return session;
  }

  touch(session: OperatorSession, source: string): void {
    if (session.lastSeen !== source) {
      this.logger.debug('operator_address', { operatorId: session.operatorId, address: source });
      session.lastSeen = source;
    }
  }

  queueFor(operatorId: string): SerialQueue {
    let queue = this.queues.get(operatorId);
    if (!queue) {
      queue = new SerialQueue();
      this.queues.set(operatorId, queue);
    }
    return queue;
  }

  /**
   * Create or replace the operator's session. Runs on the operator's queue.
   */
  provision(msg: ProvisionWallet, source: string): Promise<ProvisionOutcome> {
    return this.queueFor(msg.operatorId).run(async () => {
      const fingerprint = credentialFingerprint(msg.viewKey, msg.walletAddress);
      const existing = this.sessions.get(msg.operatorId);
      if (existing && existing.fingerprint === fingerprint) {
        this.touch(existing, source);
        this.logger.info('provision_unchanged', { operatorId: msg.operatorId });
        return { session: existing, changed: false };
      }

      const walletName = msg.walletName ?? walletNameFor(msg.operatorId, fingerprint);
      const wallet = await this.host.provision({
        walletName,
        address: msg.walletAddress,
        viewKey: msg.viewKey,
        restoreHeight: msg.restoreHeight,
      });

      const stored: StoredOperator = {
        walletName,
        walletAddress: msg.walletAddress,
        fingerprint,
        restoreHeight: msg.restoreHeight,
        provisionedAt: this.now(),
      };
      const session = this.attach(msg.operatorId, stored, wallet);
      session.lastSeen = source;
      await this.opts.store?.save(msg.operatorId, stored);

      this.logger.info(existing ? 'provision_replaced' : 'provision_created', {
        operatorId: msg.operatorId,
        wallet: walletName,
        restoreHeight: msg.restoreHeight,
      });
      return { session, changed: true };
    });
  }

  /** Reattach operators saved by an earlier run; returns how many */
  async restore(): Promise<number> {
    const store = this.opts.store;
    if (!store) return 0;
    const entries = await store.load();
    for (const [operatorId, stored] of entries) {
      this.attach(operatorId, stored, this.host.open(stored.walletName));
    }
    if (entries.size > 0) {
      this.logger.info('sessions_restored', { count: entries.size });
    }
    return entries.size;
  }

  private attach(operatorId: string, stored: StoredOperator, wallet: ViewWallet): OperatorSession {
    const session: OperatorSession = {
      operatorId,
      fingerprint: stored.fingerprint,
      walletName: stored.walletName,
      walletAddress: stored.walletAddress,
      restoreHeight: stored.restoreHeight,
      wallet,
      queue: this.queueFor(operatorId),
      intents: new IntentBook({ ttlMs: this.opts.intentTtlMs, archiveSize: this.opts.archiveSize, now: this.now }),
      keyImages: new KeyImageLedger(operatorId, { now: this.now }),
      balance: null,
      lastSeen: null,
      scan: 'IDLE',
      provisionedAt: stored.provisionedAt,
    };
    this.sessions.set(operatorId, session);
    return session;
  }
}
