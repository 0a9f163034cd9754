/**
 * Request Router
 *
 * Resolves every request except provision_wallet to its operator session and
 * dispatches on the message kind. Wallet work runs on the operator's queue.
 */

import {
  ProtocolError,
  describeError,
  silentLogger,
  type BalanceRequest,
  type BalanceResponse,
  type ExportOutputs,
  type HistoryResponse,
  type ImportKeyImages,
  type KeyImagesApplied,
  type Logger,
  type OutputsResponse,
  type ProvisionAck,
  type ProvisionWallet,
  type RequestMessage,
  type ResponseMessage,
  type TransactionHistory,
  type TransferEntry,
} from '@coldmesh/protocol';
import {
  formatXmr,
  isWalletEngineError,
  type KeyImageImport,
  type TransferRecord,
  type WalletBalance,
} from '@coldmesh/wallet-rpc';
import { staleBalanceError, type ColdSigning } from './coldSigning.js';
import { engineFailure } from './engineErrors.js';
import type { StatusNotifier } from './notifier.js';
import type { OperatorSession, ProvisionOutcome, SessionRegistry } from './sessions.js';

export interface RelayRouterOptions {
  registry: SessionRegistry;
  coldSigning: ColdSigning;
  notifier: StatusNotifier;
  now?: () => number;
  logger?: Logger;
}

export class RelayRouter {
  private readonly registry: SessionRegistry;
  private readonly coldSigning: ColdSigning;
  private readonly notifier: StatusNotifier;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly scans = new Set<Promise<void>>();

  constructor(opts: RelayRouterOptions) {
    this.registry = opts.registry;
    this.coldSigning = opts.coldSigning;
    this.notifier = opts.notifier;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Request handler for ReliableEndpoint.serve */
  handle = async (msg: RequestMessage, source: string): Promise<ResponseMessage> => {
    this.logger.info('request', { operatorId: msg.operatorId, requestId: msg.requestId, kind: msg.kind, source });

    if (msg.kind === 'provision_wallet') {
      return this.provision(msg, source);
    }

    const session = this.registry.require(msg.operatorId, msg.requestId);
    this.registry.touch(session, source);

    switch (msg.kind) {
      case 'balance_request':
        return session.queue.run(() => this.balance(session, msg));
      case 'create_transaction':
        return session.queue.run(() => this.coldSigning.create(session, msg));
      case 'signed_transaction':
        return session.queue.run(() => this.coldSigning.submit(session, msg));
      case 'transaction_history':
        return session.queue.run(() => this.history(session, msg));
      case 'export_outputs':
        return session.queue.run(() => this.exportOutputs(session, msg));
      case 'import_key_images':
        return session.queue.run(() => this.importKeyImages(session, msg));
      default: {
        const unhandled: never = msg;
        throw new ProtocolError('UNKNOWN_KIND', `No handler for ${JSON.stringify(unhandled)}`);
      }
    }
  };

  /** Wait for rescans started by provisioning (tests and shutdown) */
  async settled(): Promise<void> {
    await Promise.all([...this.scans]);
  }

  private async provision(msg: ProvisionWallet, source: string): Promise<ProvisionAck> {
    const ack = (success: boolean, status: string, scanStarted: boolean): ProvisionAck => ({
      kind: 'provision_ack',
      operatorId: msg.operatorId,
      requestId: msg.requestId,
      success,
      status,
      scanStarted,
    });

    let outcome: ProvisionOutcome;
    try {
      outcome = await this.registry.provision(msg, source);
    } catch (err) {
      const failure = engineFailure(err, 'CONSTRUCTION_ERROR', msg);
      if (failure.code === 'ENGINE_UNAVAILABLE') {
        throw failure;
      }
      this.logger.warn('provision_failed', { operatorId: msg.operatorId, error: failure.message });
      return ack(false, failure.message, false);
    }

    if (!outcome.changed) {
      return ack(true, 'unchanged', false);
    }
    this.startRescan(outcome.session);
    return ack(
      true,
      `View-only wallet ${outcome.session.walletName} ready; scanning from height ${outcome.session.restoreHeight}`,
      true,
    );
  }

  private startRescan(session: OperatorSession) {
    session.scan = 'SCANNING';
    const scan = session.queue
      .run(() => session.wallet.refresh(session.restoreHeight))
      .then(
        () => {
          // A newer provisioning may have replaced this session meanwhile
          if (this.registry.get(session.operatorId) !== session) return;
          session.scan = 'IDLE';
          this.logger.info('scan_complete', { operatorId: session.operatorId });
          this.notifier.notify(session, 'scan_complete', `Wallet scan from height ${session.restoreHeight} complete`);
        },
        (err: unknown) => {
          if (this.registry.get(session.operatorId) !== session) return;
          session.scan = 'FAILED';
          this.logger.error('scan_failed', { operatorId: session.operatorId, error: describeError(err) });
          this.notifier.notify(session, 'scan_failed', `Wallet scan failed: ${describeError(err)}`);
        },
      )
      .finally(() => {
        this.scans.delete(scan);
      });
    this.scans.add(scan);
    this.notifier.notify(session, 'scan_started', `Scanning from height ${session.restoreHeight}`);
  }

  private async balance(session: OperatorSession, msg: BalanceRequest): Promise<BalanceResponse> {
    if (session.keyImages.isStale()) {
      throw staleBalanceError(session, msg);
    }

    try {
      await session.wallet.refresh();
    } catch (err) {
      if (!isWalletEngineError(err)) throw err;
      this.logger.warn('refresh_failed', { operatorId: session.operatorId, error: err.message });
    }

    let balance: WalletBalance;
    let height: number;
    try {
      balance = await session.wallet.getBalance();
      height = await session.wallet.getHeight();
    } catch (err) {
      const failure = engineFailure(err, 'ENGINE_UNAVAILABLE', msg);
      const cached = session.balance;
      if (failure.code !== 'ENGINE_UNAVAILABLE' || !cached) {
        throw failure;
      }
      this.logger.warn('balance_from_cache', { operatorId: session.operatorId, cachedAt: cached.at, error: failure.message });
      return { ...balanceResponse(msg, cached.balance, cached.height), cachedAt: cached.at };
    }
    session.balance = { balance, height, at: this.now() };
    return balanceResponse(msg, balance, height);
  }

  private async history(session: OperatorSession, msg: TransactionHistory): Promise<HistoryResponse> {
    let records: TransferRecord[];
    try {
      records = await session.wallet.getTransfers(msg.minHeight);
    } catch (err) {
      throw engineFailure(err, 'ENGINE_UNAVAILABLE', msg);
    }

    // Mempool entries (height 0) first, then newest blocks first
    const ordered = [...records].sort((a, b) => {
      const ha = a.height === 0 ? Number.MAX_SAFE_INTEGER : a.height;
      const hb = b.height === 0 ? Number.MAX_SAFE_INTEGER : b.height;
      return hb - ha || b.timestamp - a.timestamp;
    });

    const transfers = ordered.slice(0, msg.limit).map((record): TransferEntry => {
      const entry: TransferEntry = {
        hash: record.hash,
        height: record.height,
        timestamp: record.timestamp,
        amount: formatXmr(record.amountAtomic),
        fee: formatXmr(record.feeAtomic),
        direction: record.direction,
        confirmations: record.confirmations,
      };
      if (record.address) {
        entry.counterparty = record.address;
      }
      return entry;
    });

    return { kind: 'history_response', operatorId: msg.operatorId, requestId: msg.requestId, transfers };
  }

  private async exportOutputs(session: OperatorSession, msg: ExportOutputs): Promise<OutputsResponse> {
    let outputsDataHex: string;
    try {
      outputsDataHex = await session.wallet.exportOutputs(msg.all);
    } catch (err) {
      throw engineFailure(err, 'ENGINE_UNAVAILABLE', msg);
    }
    this.logger.info('outputs_exported', { operatorId: msg.operatorId, bytes: outputsDataHex.length / 2 });
    return { kind: 'outputs_response', operatorId: msg.operatorId, requestId: msg.requestId, outputsDataHex };
  }

  private async importKeyImages(session: OperatorSession, msg: ImportKeyImages): Promise<KeyImagesApplied> {
    const awaiting = session.keyImages.awaitingSpends().map((b) => b.batchId);
    if (msg.signedKeyImages.length === 0 && awaiting.length > 0) {
      this.logger.warn('empty_key_image_import', { operatorId: msg.operatorId, batchId: msg.batchId, awaiting });
      this.notifier.notify(
        session,
        'balance_stale',
        `Key-image import carried no key images; still waiting on ${awaiting.join(', ')}`,
      );
      throw new ProtocolError(
        'STALE_BALANCE',
        `Import carried no key images; balance stays stale until key images arrive for ${awaiting.join(', ')}`,
        msg,
      );
    }

    const batch = session.keyImages.open(msg.batchId, 'import', msg.exportedAt);

    let result: KeyImageImport;
    try {
      result = await session.wallet.importKeyImages(msg.signedKeyImages, msg.offset);
    } catch (err) {
      this.logger.warn('key_image_import_failed', { operatorId: msg.operatorId, batchId: msg.batchId });
      throw engineFailure(err, 'ENGINE_UNAVAILABLE', msg);
    }

    const applied = session.keyImages.markApplied(batch.batchId, {
      height: result.height,
      spentAtomic: result.spentAtomic,
      unspentAtomic: result.unspentAtomic,
    });
    session.balance = null;
    this.logger.info('key_images_applied', {
      operatorId: msg.operatorId,
      batchId: msg.batchId,
      images: msg.signedKeyImages.length,
      batches: applied.map((b) => b.batchId),
    });

    return {
      kind: 'key_images_applied',
      operatorId: msg.operatorId,
      requestId: msg.requestId,
      batchId: msg.batchId,
      height: result.height,
      spent: formatXmr(result.spentAtomic),
      unspent: formatXmr(result.unspentAtomic),
    };
  }
}

function balanceResponse(msg: BalanceRequest, balance: WalletBalance, height: number): BalanceResponse {
  return {
    kind: 'balance_response',
    operatorId: msg.operatorId,
    requestId: msg.requestId,
    balance: formatXmr(balance.balanceAtomic),
    unlockedBalance: formatXmr(balance.unlockedAtomic),
    balanceAtomic: balance.balanceAtomic.toString(),
    unlockedAtomic: balance.unlockedAtomic.toString(),
    syncHeight: height,
    blocksToUnlock: balance.blocksToUnlock,
  };
}
