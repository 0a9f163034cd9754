/**
 * In-process wallet engine
 *
 * A deterministic stand-in for the view-only side of the wallet engine:
 * a shared chain with a block height and a mempool, and one wallet per
 * operator holding a balance and its transfers. Constructions and
 * broadcasts produce artifacts derived from their inputs, so the same
 * scenario always yields the same keys and hashes.
 */

import type {
  CreateUnsignedParams,
  KeyImage,
  KeyImageImport,
  ProvisionParams,
  SignedIdentity,
  TransferRecord,
  UnsignedTransfer,
  ViewWallet,
  WalletBalance,
  WalletHost,
} from '@coldmesh/wallet-rpc';
import { WalletEngineError } from '@coldmesh/wallet-rpc';
import { decodeSigned, encodeArtifact, sha256Hex, signedTxHash } from './artifacts.js';
import { CallRecorder } from './calls.js';

/** Fee charged for every construction unless configured otherwise: 0.00012 XMR */
export const DEFAULT_MOCK_FEE = 120_000_000n;

/** Blocks a locked deposit reports as `blocksToUnlock` */
export const UNLOCK_BLOCKS = 10;

export interface MockTransfer {
  hash: string;
  direction: 'in' | 'out';
  amountAtomic: bigint;
  feeAtomic: bigint;
  /** 0 while in the mempool */
  height: number;
  timestamp: number;
  address?: string;
}

export class MockChain {
  height: number;
  private readonly mempool = new Set<MockTransfer>();
  private readonly clock: () => number;

  constructor(startHeight = 3_200_000, clock: () => number = Date.now) {
    this.height = startHeight;
    this.clock = clock;
  }

  now(): number {
    return Math.floor(this.clock() / 1000);
  }

  enqueue(transfer: MockTransfer): void {
    this.mempool.add(transfer);
  }

  /** Mine `blocks` blocks; everything in the mempool lands in the first one. */
  mine(blocks = 1): void {
    for (const transfer of this.mempool) {
      transfer.height = this.height + 1;
    }
    this.mempool.clear();
    this.height += blocks;
  }

  confirmations(transfer: MockTransfer): number {
    if (transfer.height === 0) return 0;
    return Math.max(0, this.height - transfer.height + 1);
  }
}

export class MockViewWallet implements ViewWallet {
  readonly name: string;
  readonly calls = new CallRecorder();
  restoreHeight = 0;
  feeAtomic: bigint;
  /** Delay of refresh(); rescans in tests can be held open with it */
  refreshDelayMs = 0;
  /** When set, every broadcast is refused with this engine message */
  broadcastRejection: string | null = null;
  keyImagesImported = 0;
  lastRescanFrom: number | undefined;

  private balance = 0n;
  private locked = 0n;
  private spent = 0n;
  private constructions = 0;
  private deposits = 0;
  private readonly transfers: MockTransfer[] = [];

  constructor(
    name: string,
    private readonly chain: MockChain,
    feeAtomic: bigint = DEFAULT_MOCK_FEE,
  ) {
    this.name = name;
    this.feeAtomic = feeAtomic;
  }

  /** Credit an incoming transfer, mined in the current block */
  deposit(amountAtomic: bigint, opts: { locked?: boolean } = {}): string {
    this.deposits += 1;
    const hash = sha256Hex(`deposit:${this.name}:${this.deposits}:${amountAtomic}`);
    this.transfers.push({
      hash,
      direction: 'in',
      amountAtomic,
      feeAtomic: 0n,
      height: this.chain.height,
      timestamp: this.chain.now(),
    });
    this.balance += amountAtomic;
    if (opts.locked) {
      this.locked += amountAtomic;
    }
    return hash;
  }

  unlockAll(): void {
    this.locked = 0n;
  }

  async refresh(startHeight?: number): Promise<void> {
    this.calls.enter('refresh');
    if (startHeight !== undefined) {
      this.lastRescanFrom = startHeight;
    }
    if (this.refreshDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.refreshDelayMs));
    }
  }

  async getBalance(): Promise<WalletBalance> {
    this.calls.enter('getBalance');
    return {
      balanceAtomic: this.balance,
      unlockedAtomic: this.balance - this.locked,
      blocksToUnlock: this.locked > 0n ? UNLOCK_BLOCKS : 0,
    };
  }

  async getHeight(): Promise<number> {
    this.calls.enter('getHeight');
    return this.chain.height;
  }

  async exportOutputs(all: boolean): Promise<string> {
    this.calls.enter('exportOutputs');
    const count = this.transfers.filter((t) => t.direction === 'in').length;
    return Buffer.from(JSON.stringify({ type: 'outputs', wallet: this.name, count, all }), 'utf8').toString('hex');
  }

  async createUnsigned(params: CreateUnsignedParams): Promise<UnsignedTransfer> {
    this.calls.enter('createUnsigned');
    if (params.amountAtomic <= 0n) {
      throw new WalletEngineError('rejected', 'Transaction amount must be positive', { method: 'transfer' });
    }
    const total = params.amountAtomic + this.feeAtomic;
    if (total > this.balance) {
      throw new WalletEngineError('rejected', 'not enough money', { method: 'transfer', rpcCode: -4 });
    }
    if (total > this.balance - this.locked) {
      throw new WalletEngineError('rejected', 'not enough unlocked money', { method: 'transfer', rpcCode: -4 });
    }

    this.constructions += 1;
    const txKey = sha256Hex(`${this.name}:${this.constructions}:${params.destination}:${params.amountAtomic}`);
    const unsignedTxset = encodeArtifact({
      type: 'unsigned',
      wallet: this.name,
      txKey,
      destination: params.destination,
      amountAtomic: params.amountAtomic.toString(),
      feeAtomic: this.feeAtomic.toString(),
    });
    return { unsignedTxset, txKey, amountAtomic: params.amountAtomic, feeAtomic: this.feeAtomic };
  }

  async describeSigned(signedTxset: string): Promise<SignedIdentity> {
    this.calls.enter('describeSigned');
    return { txKey: decodeSigned(signedTxset, 'describe_transfer').txKey };
  }

  async submitSigned(signedTxset: string): Promise<string[]> {
    this.calls.enter('submitSigned');
    const artifact = decodeSigned(signedTxset, 'submit_transfer');
    if (this.broadcastRejection !== null) {
      throw new WalletEngineError('rejected', this.broadcastRejection, { method: 'submit_transfer' });
    }
    if (artifact.wallet !== this.name) {
      throw new WalletEngineError('rejected', 'Transaction was built by another wallet', { method: 'submit_transfer' });
    }
    const hash = signedTxHash(signedTxset);
    if (this.transfers.some((t) => t.hash === hash)) {
      throw new WalletEngineError('rejected', 'Transaction is a double spend', { method: 'submit_transfer' });
    }

    const amountAtomic = BigInt(artifact.amountAtomic);
    const feeAtomic = BigInt(artifact.feeAtomic);
    const transfer: MockTransfer = {
      hash,
      direction: 'out',
      amountAtomic,
      feeAtomic,
      height: 0,
      timestamp: this.chain.now(),
      address: artifact.destination,
    };
    this.transfers.push(transfer);
    this.chain.enqueue(transfer);
    this.balance -= amountAtomic + feeAtomic;
    this.spent += amountAtomic + feeAtomic;
    return [hash];
  }

  async importKeyImages(keyImages: KeyImage[], _offset: number): Promise<KeyImageImport> {
    this.calls.enter('importKeyImages');
    this.keyImagesImported += keyImages.length;
    return { height: this.chain.height, spentAtomic: this.spent, unspentAtomic: this.balance };
  }

  async getTransfers(minHeight: number): Promise<TransferRecord[]> {
    this.calls.enter('getTransfers');
    return this.transfers.filter((t) => t.height === 0 || t.height >= minHeight).map((t) => this.toRecord(t));
  }

  async getTransferByHash(hash: string): Promise<TransferRecord | null> {
    this.calls.enter('getTransferByHash');
    const transfer = this.transfers.find((t) => t.hash === hash);
    return transfer ? this.toRecord(transfer) : null;
  }

  private toRecord(transfer: MockTransfer): TransferRecord {
    const record: TransferRecord = {
      hash: transfer.hash,
      height: transfer.height,
      timestamp: transfer.timestamp,
      amountAtomic: transfer.amountAtomic,
      feeAtomic: transfer.feeAtomic,
      direction: transfer.direction,
      confirmations: this.chain.confirmations(transfer),
    };
    if (transfer.address) {
      record.address = transfer.address;
    }
    return record;
  }
}

export interface MockWalletHostOptions {
  chain?: MockChain;
  feeAtomic?: bigint;
  /** Deposit credited to every wallet when it is first created */
  startingBalanceAtomic?: bigint;
}

export class MockWalletHost implements WalletHost {
  readonly chain: MockChain;
  readonly provisions: ProvisionParams[] = [];
  private readonly wallets = new Map<string, MockViewWallet>();
  private readonly feeAtomic: bigint;
  private readonly startingBalance: bigint;

  constructor(opts: MockWalletHostOptions = {}) {
    this.chain = opts.chain ?? new MockChain();
    this.feeAtomic = opts.feeAtomic ?? DEFAULT_MOCK_FEE;
    this.startingBalance = opts.startingBalanceAtomic ?? 0n;
  }

  async provision(params: ProvisionParams): Promise<MockViewWallet> {
    this.provisions.push(params);
    const wallet = this.wallet(params.walletName);
    wallet.restoreHeight = params.restoreHeight;
    return wallet;
  }

  open(walletName: string): MockViewWallet {
    return this.wallet(walletName);
  }

  /** The wallet of that name, created empty on first use */
  wallet(walletName: string): MockViewWallet {
    let wallet = this.wallets.get(walletName);
    if (!wallet) {
      wallet = new MockViewWallet(walletName, this.chain, this.feeAtomic);
      if (this.startingBalance > 0n) {
        wallet.deposit(this.startingBalance);
      }
      this.wallets.set(walletName, wallet);
    }
    return wallet;
  }
}
