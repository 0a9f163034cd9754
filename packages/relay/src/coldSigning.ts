/**
 * Cold-Signing Flow
 *
 * Drives an operator's intents through construction, signature check and
 * broadcast. Callers run every method on the operator's serial queue.
 */

import { createHash } from 'crypto';
import {
  Hex32Schema,
  ProtocolError,
  silentLogger,
  type CreateTransaction,
  type Logger,
  type SignedTransaction,
  type TransactionResult,
  type UnsignedTransaction,
} from '@coldmesh/protocol';
import { formatXmr, parseXmr } from '@coldmesh/wallet-rpc';
import { constructionFailure, engineFailure, type RequestContext } from './engineErrors.js';
import type { IntentFailure, TransactionIntent } from './intents.js';
import type { StatusNotifier } from './notifier.js';
import type { OperatorSession } from './sessions.js';

export interface ColdSigningOptions {
  notifier: StatusNotifier;
  logger?: Logger;
}

function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

function context(msg: RequestContext): RequestContext {
  return { operatorId: msg.operatorId, requestId: msg.requestId };
}

export function staleBalanceError(session: OperatorSession, ctx: RequestContext): ProtocolError {
  const pending = session.keyImages.unapplied().map((batch) => batch.batchId);
  return new ProtocolError(
    'STALE_BALANCE',
    `Balance is stale until key images are imported for ${pending.join(', ')}`,
    ctx,
  );
}

export class ColdSigning {
  private readonly notifier: StatusNotifier;
  private readonly logger: Logger;

  constructor(opts: ColdSigningOptions) {
    this.notifier = opts.notifier;
    this.logger = opts.logger ?? silentLogger;
  }

  async create(session: OperatorSession, msg: CreateTransaction): Promise<UnsignedTransaction> {
    const ctx = context(msg);
    const existing = session.intents.get(msg.requestId);
    if (existing) {
      session.intents.checkExpiry(existing);
      if (existing.state === 'UNSIGNED_READY') {
        return this.unsignedMessage(existing);
      }
      throw new ProtocolError(
        'CONSTRUCTION_ERROR',
        `Request ${msg.requestId} was already used; its transaction is ${existing.state}`,
        ctx,
      );
    }

    if (session.keyImages.isStale()) {
      throw staleBalanceError(session, ctx);
    }

    const amountAtomic = parseXmr(msg.amount);
    if (amountAtomic === 0n) {
      throw new ProtocolError('CONSTRUCTION_ERROR', 'Amount must be greater than zero', ctx);
    }

    const intent = session.intents.open({
      operatorId: msg.operatorId,
      requestId: msg.requestId,
      destination: msg.destination,
      amountAtomic,
      priority: msg.priority,
    });

    try {
      const before = await session.wallet.getBalance();
      const unsigned = await session.wallet.createUnsigned({
        destination: msg.destination,
        amountAtomic,
        priority: msg.priority,
      });
      const totalAtomic = unsigned.amountAtomic + unsigned.feeAtomic;
      session.intents.transition(intent, 'UNSIGNED_READY', {
        unsigned,
        txKey: unsigned.txKey,
        feeAtomic: unsigned.feeAtomic,
        totalAtomic,
        changeAtomic: before.unlockedAtomic > totalAtomic ? before.unlockedAtomic - totalAtomic : 0n,
      });
    } catch (err) {
      const failure = constructionFailure(err, ctx);
      if (failure.code === 'ENGINE_UNAVAILABLE') {
        // Nothing was built; a retry of this request id starts over
        session.intents.discard(intent);
      } else {
        session.intents.fail(intent, failure.code, failure.message);
      }
      this.logger.warn('construction_failed', { ...ctx, code: failure.code, error: failure.message });
      throw failure;
    }

    this.logger.info('unsigned_ready', {
      ...ctx,
      amount: msg.amount,
      fee: intent.feeAtomic,
      txKey: intent.txKey,
    });
    return this.unsignedMessage(intent);
  }

  async submit(session: OperatorSession, msg: SignedTransaction): Promise<TransactionResult> {
    const ctx = context(msg);
    const intent = session.intents.get(msg.requestId);
    if (!intent) {
      throw new ProtocolError('SIGNATURE_MISMATCH', `No unsigned transaction was issued for request ${msg.requestId}`, ctx);
    }
    session.intents.checkExpiry(intent);

    const digest = sha256Hex(msg.signedArtifact);

    switch (intent.state) {
      case 'EXPIRED':
        throw new ProtocolError(
          'EXPIRED',
          `Transaction request ${msg.requestId} expired at ${new Date(intent.expiresAt).toISOString()}`,
          ctx,
        );

      case 'FAILED': {
        const failure: IntentFailure = intent.failure ?? { code: 'CONSTRUCTION_ERROR', message: 'Transaction failed' };
        throw new ProtocolError(failure.code, failure.message, ctx);
      }

      case 'REQUESTED':
        throw new ProtocolError('SIGNATURE_MISMATCH', `Request ${msg.requestId} has no unsigned transaction yet`, ctx);

      case 'SUBMITTED':
      case 'CONFIRMED':
        if (digest !== intent.signedDigest) {
          throw new ProtocolError(
            'SIGNATURE_MISMATCH',
            `A different signed transaction was already broadcast for request ${msg.requestId}`,
            ctx,
          );
        }
        this.logger.info('resubmission_answered', { ...ctx, txHash: intent.txHash });
        return this.resultMessage(intent);

      case 'SIGNED':
        // An earlier broadcast attempt could not reach the engine
        if (digest !== intent.signedDigest) {
          throw new ProtocolError(
            'SIGNATURE_MISMATCH',
            `A different signed transaction was already accepted for request ${msg.requestId}`,
            ctx,
          );
        }
        return this.broadcast(session, intent, msg.signedArtifact, ctx);

      case 'UNSIGNED_READY': {
        const embedded = await this.embeddedKey(session, msg);
        if (embedded !== intent.txKey || msg.txKey !== intent.txKey) {
          this.logger.warn('signature_mismatch', { ...ctx, expected: intent.txKey, embedded, claimed: msg.txKey });
          throw new ProtocolError(
            'SIGNATURE_MISMATCH',
            `Signed transaction was not made from the unsigned transaction issued for request ${msg.requestId}`,
            ctx,
          );
        }
        session.intents.transition(intent, 'SIGNED', { signedDigest: digest });
        return this.broadcast(session, intent, msg.signedArtifact, ctx);
      }
    }
  }

  /** txKey the engine reads out of the signed artifact; the message's own txKey alone proves nothing */
  private async embeddedKey(session: OperatorSession, msg: SignedTransaction): Promise<string> {
    try {
      const identity = await session.wallet.describeSigned(msg.signedArtifact);
      return identity.txKey;
    } catch (err) {
      throw engineFailure(err, 'SIGNATURE_MISMATCH', context(msg));
    }
  }

  private async broadcast(
    session: OperatorSession,
    intent: TransactionIntent,
    signedArtifact: string,
    ctx: RequestContext,
  ): Promise<TransactionResult> {
    let hashes: string[];
    try {
      hashes = await session.wallet.submitSigned(signedArtifact);
    } catch (err) {
      const failure = engineFailure(err, 'BROADCAST_REJECTED', ctx);
      if (failure.code === 'BROADCAST_REJECTED') {
        session.intents.fail(intent, failure.code, failure.message);
      }
      this.logger.warn('broadcast_failed', { ...ctx, code: failure.code, error: failure.message });
      throw failure;
    }

    const txHash = hashes[0];
    if (!txHash || !Hex32Schema.safeParse(txHash).success) {
      const message = `Engine returned no usable transaction hash: ${JSON.stringify(hashes)}`;
      session.intents.fail(intent, 'BROADCAST_REJECTED', message);
      throw new ProtocolError('BROADCAST_REJECTED', message, ctx);
    }

    session.intents.transition(intent, 'SUBMITTED', { txHash });
    session.keyImages.open(intent.requestId, 'broadcast');
    session.balance = null;

    this.logger.info('broadcast', { ...ctx, txHash });
    this.notifier.notify(session, 'tx_broadcast', 'Transaction broadcast; balance is stale until key images are imported', {
      txHash,
      amount: formatXmr(intent.amountAtomic),
    });
    return this.resultMessage(intent);
  }

  private unsignedMessage(intent: TransactionIntent): UnsignedTransaction {
    const { unsigned, feeAtomic, totalAtomic, changeAtomic } = intent;
    if (!unsigned || feeAtomic === null || totalAtomic === null || changeAtomic === null) {
      throw new Error(`Intent ${intent.requestId} has no unsigned transaction`);
    }
    return {
      kind: 'unsigned_transaction',
      operatorId: intent.operatorId,
      requestId: intent.requestId,
      unsignedArtifact: unsigned.unsignedTxset,
      txKey: unsigned.txKey,
      fee: formatXmr(feeAtomic),
      total: formatXmr(totalAtomic),
      change: formatXmr(changeAtomic),
      expiresAt: intent.expiresAt,
    };
  }

  private resultMessage(intent: TransactionIntent): TransactionResult {
    const { txHash, txKey, feeAtomic } = intent;
    if (!txHash || !txKey || feeAtomic === null) {
      throw new Error(`Intent ${intent.requestId} has not been broadcast`);
    }
    return {
      kind: 'transaction_result',
      operatorId: intent.operatorId,
      requestId: intent.requestId,
      txHash,
      txKey,
      fee: formatXmr(feeAtomic),
      status: intent.state === 'CONFIRMED' ? 'confirmed' : 'broadcast',
    };
  }
}
