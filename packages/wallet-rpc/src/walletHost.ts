/**
 * View-only wallets on a pool of wallet-rpc processes
 *
 * A wallet-rpc process keeps one wallet open at a time, so each process is
 * a lane with its own queue. Every wallet is pinned to one lane on first
 * use, the least loaded one; with as many processes as operators no
 * operator's calls wait behind another's.
 */

import { SerialQueue, silentLogger, type Logger } from '@coldmesh/protocol';
import type {
  CreateUnsignedParams,
  KeyImage,
  KeyImageImport,
  ProvisionParams,
  TransferRecord,
  UnsignedTransfer,
  ViewWallet,
  WalletBalance,
  WalletHost,
} from './engine.js';
import { WalletEngineError, isWalletEngineError } from './errors.js';
import type { WalletRpcClient } from './rpcClient.js';
import type { RpcTransferEntry } from './schema.js';
import { constructionKey, openSealed } from './sealed.js';

export interface RpcWalletHostOptions {
  /** One client per wallet-rpc process */
  pool: WalletRpcClient[];
  /** Password of the view-only wallet files (default empty) */
  walletPassword?: string;
  logger?: Logger;
}

interface Lane {
  readonly rpc: WalletRpcClient;
  readonly queue: SerialQueue;
  openWallet: string | null;
  pinned: number;
}

const ALREADY_EXISTS = /already exists/i;

export function toTransferRecord(entry: RpcTransferEntry): TransferRecord {
  const record: TransferRecord = {
    hash: entry.txid,
    height: entry.height,
    timestamp: entry.timestamp,
    amountAtomic: entry.amount,
    feeAtomic: entry.fee ?? 0n,
    direction: entry.type === 'in' || entry.type === 'pool' ? 'in' : 'out',
    confirmations: entry.confirmations ?? 0,
  };
  if (entry.address) {
    record.address = entry.address;
  }
  return record;
}

export class RpcWalletHost implements WalletHost {
  private readonly lanes: Lane[];
  private readonly pins = new Map<string, Lane>();
  private readonly password: string;
  private readonly logger: Logger;

  constructor(opts: RpcWalletHostOptions) {
    if (opts.pool.length === 0) {
      throw new Error('RpcWalletHost needs at least one wallet-rpc client');
    }
    this.lanes = opts.pool.map((rpc) => ({ rpc, queue: new SerialQueue(), openWallet: null, pinned: 0 }));
    this.password = opts.walletPassword ?? '';
    this.logger = opts.logger ?? silentLogger;
  }

  provision(params: ProvisionParams): Promise<ViewWallet> {
    const lane = this.laneFor(params.walletName);
    return lane.queue.run(async () => {
      try {
        await lane.rpc.generateFromKeys({
          filename: params.walletName,
          address: params.address,
          viewKey: params.viewKey,
          restoreHeight: params.restoreHeight,
          password: this.password,
        });
        this.logger.info('wallet_generated', { wallet: params.walletName, restoreHeight: params.restoreHeight });
      } catch (err) {
        if (!isWalletEngineError(err) || err.reason !== 'rejected' || !ALREADY_EXISTS.test(err.message)) {
          throw err;
        }
        await lane.rpc.openWallet(params.walletName, this.password);
        this.logger.info('wallet_reopened', { wallet: params.walletName });
      }
      lane.openWallet = params.walletName;
      return this.handle(params.walletName);
    });
  }

  open(walletName: string): ViewWallet {
    return this.handle(walletName);
  }

  /** URL of the process a wallet is pinned to */
  endpointOf(walletName: string): string {
    return this.laneFor(walletName).rpc.url;
  }

  private laneFor(walletName: string): Lane {
    const pinned = this.pins.get(walletName);
    if (pinned) return pinned;

    let lane = this.lanes[0];
    for (const candidate of this.lanes) {
      if (lane === undefined || candidate.pinned < lane.pinned) {
        lane = candidate;
      }
    }
    if (lane === undefined) {
      throw new Error('RpcWalletHost has no wallet-rpc client');
    }
    lane.pinned += 1;
    this.pins.set(walletName, lane);
    if (lane.pinned > 1) {
      this.logger.warn('wallet_rpc_shared', { wallet: walletName, url: lane.rpc.url, wallets: lane.pinned });
    }
    return lane;
  }

  private withWallet<T>(walletName: string, job: (rpc: WalletRpcClient) => Promise<T>): Promise<T> {
    const lane = this.laneFor(walletName);
    return lane.queue.run(async () => {
      if (lane.openWallet !== walletName) {
        lane.openWallet = null;
        await lane.rpc.openWallet(walletName, this.password);
        lane.openWallet = walletName;
        this.logger.debug('wallet_opened', { wallet: walletName, url: lane.rpc.url });
      }
      return job(lane.rpc);
    });
  }

  private handle(name: string): ViewWallet {
    const run = <T>(job: (rpc: WalletRpcClient) => Promise<T>) => this.withWallet(name, job);

    return {
      name,

      refresh: (startHeight) =>
        run(async (rpc) => {
          await rpc.refresh(startHeight);
        }),

      getBalance: () =>
        run(async (rpc): Promise<WalletBalance> => {
          const result = await rpc.getBalance();
          return {
            balanceAtomic: result.balance,
            unlockedAtomic: result.unlocked_balance,
            blocksToUnlock: result.blocks_to_unlock,
          };
        }),

      getHeight: () => run((rpc) => rpc.getHeight()),

      exportOutputs: (all) => run((rpc) => rpc.exportOutputs(all)),

      createUnsigned: (params: CreateUnsignedParams) =>
        run(async (rpc): Promise<UnsignedTransfer> => {
          const result = await rpc.transfer(params);
          const unsignedTxset = result.unsigned_txset || result.tx_metadata || '';
          if (!unsignedTxset) {
            throw new WalletEngineError('rejected', 'Engine returned no unsigned transaction set', {
              method: 'transfer',
            });
          }
          return {
            unsignedTxset,
            txKey: constructionKey(unsignedTxset),
            amountAtomic: result.amount,
            feeAtomic: result.fee,
          };
        }),

      // Reading the seal needs no engine call
      describeSigned: async (signedTxset) => ({ txKey: openSealed(signedTxset, 'submit_transfer').txKey }),

      submitSigned: async (signedTxset) => {
        const opened = openSealed(signedTxset, 'submit_transfer');
        return run((rpc) => rpc.submitTransfer(opened.signedTxset));
      },

      importKeyImages: (keyImages: KeyImage[], offset) =>
        run(async (rpc): Promise<KeyImageImport> => {
          const result = await rpc.importKeyImages(
            keyImages.map((k) => ({ key_image: k.keyImage, signature: k.signature })),
            offset,
          );
          return { height: result.height, spentAtomic: result.spent, unspentAtomic: result.unspent };
        }),

      getTransfers: (minHeight) =>
        run(async (rpc) => {
          const result = await rpc.getTransfers(minHeight);
          return [...result.in, ...result.out, ...result.pending, ...result.pool].map(toTransferRecord);
        }),

      getTransferByHash: (hash) =>
        run(async (rpc) => {
          try {
            return toTransferRecord(await rpc.getTransferByTxid(hash));
          } catch (err) {
            if (isWalletEngineError(err) && err.reason === 'rejected') {
              return null;
            }
            throw err;
          }
        }),
    };
  }
}
