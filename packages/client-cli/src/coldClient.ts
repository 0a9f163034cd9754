/**
 * Cold Client
 *
 * The operator's side of the link. Every call is one request to the relay
 * over a reliable endpoint; `send` runs the whole cold-signing round with a
 * local signing wallet that never talks to the network.
 */

import {
  describeError,
  silentLogger,
  type BalanceResponse,
  type HistoryResponse,
  type KeyImagesApplied,
  type Logger,
  type ProvisionAck,
  type ReliableEndpoint,
  type StatusMessage,
  type TransactionResult,
  type TransferEntry,
  type UnsignedTransaction,
} from '@coldmesh/protocol';
import type { SigningWallet } from '@coldmesh/wallet-rpc';

export interface ColdClientOptions {
  endpoint: ReliableEndpoint;
  /** Mesh address of the relay node */
  relayAddress: string;
  operatorId: string;
  /** Needed by `send` and `syncKeyImages` only */
  signer?: SigningWallet;
  now?: () => number;
  logger?: Logger;
}

export interface ProvisionParams {
  viewKey: string;
  walletAddress: string;
  restoreHeight: number;
  walletName?: string;
}

export interface SendOutcome {
  unsigned: UnsignedTransaction;
  result: TransactionResult;
  /** null when the key images could not be handed over; `sync` retries */
  keyImages: KeyImagesApplied | null;
}

export class ColdClient {
  private readonly endpoint: ReliableEndpoint;
  private readonly relay: string;
  private readonly signer: SigningWallet | undefined;
  private readonly now: () => number;
  private readonly logger: Logger;
  private counter = 0;

  readonly operatorId: string;

  constructor(opts: ColdClientOptions) {
    this.endpoint = opts.endpoint;
    this.relay = opts.relayAddress;
    this.operatorId = opts.operatorId;
    this.signer = opts.signer;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Fresh request id: `${prefix}-${base36 time}-${counter}` */
  nextRequestId(prefix: string): string {
    this.counter += 1;
    return `${prefix}-${this.now().toString(36)}-${this.counter}`;
  }

  provision(params: ProvisionParams): Promise<ProvisionAck> {
    return this.endpoint.request(this.relay, {
      kind: 'provision_wallet',
      operatorId: this.operatorId,
      requestId: this.nextRequestId('prov'),
      viewKey: params.viewKey,
      walletAddress: params.walletAddress,
      restoreHeight: params.restoreHeight,
      ...(params.walletName === undefined ? {} : { walletName: params.walletName }),
    });
  }

  getBalance(): Promise<BalanceResponse> {
    return this.endpoint.request(this.relay, {
      kind: 'balance_request',
      operatorId: this.operatorId,
      requestId: this.nextRequestId('bal'),
    });
  }

  createTransaction(
    destination: string,
    amount: string,
    priority: number,
    requestId = this.nextRequestId('tx'),
  ): Promise<UnsignedTransaction> {
    return this.endpoint.request(this.relay, {
      kind: 'create_transaction',
      operatorId: this.operatorId,
      requestId,
      destination,
      amount,
      priority,
    });
  }

  /** Hand back a signature under the request id that produced `unsigned` */
  submitSigned(unsigned: UnsignedTransaction, signedArtifact: string): Promise<TransactionResult> {
    return this.endpoint.request(this.relay, {
      kind: 'signed_transaction',
      operatorId: this.operatorId,
      requestId: unsigned.requestId,
      signedArtifact,
      txKey: unsigned.txKey,
    });
  }

  async history(limit = 20, minHeight = 0): Promise<TransferEntry[]> {
    const response: HistoryResponse = await this.endpoint.request(this.relay, {
      kind: 'transaction_history',
      operatorId: this.operatorId,
      requestId: this.nextRequestId('hist'),
      limit,
      minHeight,
    });
    return response.transfers;
  }

  async exportOutputs(all = true): Promise<string> {
    const response = await this.endpoint.request(this.relay, {
      kind: 'export_outputs',
      operatorId: this.operatorId,
      requestId: this.nextRequestId('out'),
      all,
    });
    return response.outputsDataHex;
  }

  /**
   * Export key images from the signing wallet and apply them on the relay.
   * Applying a batch also applies every batch the relay opened before it.
   * The full set is exported unless `all` is false: images handed over by
   * an import that then failed would otherwise never reach the relay.
   */
  async syncKeyImages(batchId = this.nextRequestId('ki'), all = true): Promise<KeyImagesApplied> {
    const signer = this.requireSigner('syncKeyImages');
    const exported = await signer.exportKeyImages(all);
    return this.endpoint.request(this.relay, {
      kind: 'import_key_images',
      operatorId: this.operatorId,
      requestId: this.nextRequestId('ki'),
      batchId,
      exportedAt: this.now(),
      signedKeyImages: exported.keyImages,
      offset: exported.offset,
    });
  }

  /**
   * Full cold-signing round: refresh the signer's outputs, build, sign,
   * submit, then return the spent key images so the relay's balance is
   * trustworthy again.
   */
  async send(destination: string, amount: string, priority = 0): Promise<SendOutcome> {
    const signer = this.requireSigner('send');

    const outputs = await this.exportOutputs(true);
    const imported = await signer.importOutputs(outputs);
    this.logger.info('outputs_imported', { operatorId: this.operatorId, outputs: imported });

    const unsigned = await this.createTransaction(destination, amount, priority);
    this.logger.info('unsigned_received', {
      operatorId: this.operatorId,
      requestId: unsigned.requestId,
      fee: unsigned.fee,
      total: unsigned.total,
      expiresAt: new Date(unsigned.expiresAt).toISOString(),
    });

    const signed = await signer.signTransfer(unsigned.unsignedArtifact);
    const result = await this.submitSigned(unsigned, signed.signedTxset);
    this.logger.info('transaction_submitted', {
      operatorId: this.operatorId,
      requestId: result.requestId,
      txHash: result.txHash,
      status: result.status,
    });

    let keyImages: KeyImagesApplied | null = null;
    try {
      keyImages = await this.syncKeyImages(result.requestId);
    } catch (err) {
      // The transfer is out; a later `sync` clears the stale balance
      this.logger.warn('key_image_sync_failed', {
        operatorId: this.operatorId,
        batchId: result.requestId,
        error: describeError(err),
      });
    }

    return { unsigned, result, keyImages };
  }

  /** Status pushes for this operator */
  onStatus(handler: (status: StatusMessage) => void): () => void {
    return this.endpoint.onStatus((status) => {
      if (status.operatorId === this.operatorId) {
        handler(status);
      }
    });
  }

  private requireSigner(operation: string): SigningWallet {
    if (!this.signer) {
      throw new Error(`${operation} needs a signing wallet`);
    }
    return this.signer;
  }
}
