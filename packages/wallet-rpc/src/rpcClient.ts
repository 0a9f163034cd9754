/**
 * Wallet JSON-RPC Client
 *
 * Thin typed layer over the engine's JSON-RPC endpoint, built on viem's
 * generic client and http transport. Every result is validated with its
 * schema; every failure becomes a WalletEngineError.
 */

import { BaseError, RpcRequestError, createClient, http, rpcSchema } from 'viem';
import type { z } from 'zod';
import { describeError, silentLogger, type Logger } from '@coldmesh/protocol';
import { WalletEngineError } from './errors.js';
import {
  BalanceResultSchema,
  EmptyResultSchema,
  ExportKeyImagesResultSchema,
  ExportOutputsResultSchema,
  GenerateFromKeysResultSchema,
  GetTransferByTxidResultSchema,
  GetTransfersResultSchema,
  HeightResultSchema,
  ImportKeyImagesResultSchema,
  ImportOutputsResultSchema,
  RefreshResultSchema,
  SignTransferResultSchema,
  SubmitTransferResultSchema,
  TransferResultSchema,
  VersionResultSchema,
} from './schema.js';

export const WALLET_RPC_METHODS = [
  'get_version',
  'get_balance',
  'get_height',
  'refresh',
  'export_outputs',
  'transfer',
  'submit_transfer',
  'import_key_images',
  'get_transfers',
  'get_transfer_by_txid',
  'generate_from_keys',
  'open_wallet',
  'import_outputs',
  'sign_transfer',
  'export_key_images',
] as const;

export type WalletRpcMethod = (typeof WALLET_RPC_METHODS)[number];

type WalletRpcSchema = {
  [M in WalletRpcMethod]: { Method: M; Parameters: Record<string, unknown>; ReturnType: unknown };
}[WalletRpcMethod][];

function createRpcTransport(url: string, timeoutMs: number) {
  return createClient({
    name: 'wallet-rpc',
    transport: http(url, { retryCount: 0, timeout: timeoutMs }),
    rpcSchema: rpcSchema<WalletRpcSchema>(),
  });
}

type RpcTransport = ReturnType<typeof createRpcTransport>;

export interface WalletRpcClientOptions {
  /** JSON-RPC endpoint, e.g. http://127.0.0.1:18082/json_rpc */
  url: string;
  /** Per-call timeout (default 120s) */
  timeoutMs?: number;
  /** Timeout for refresh/rescan, which can run for a long time (default 1h) */
  scanTimeoutMs?: number;
  logger?: Logger;
}

export interface TransferParams {
  destination: string;
  amountAtomic: bigint;
  priority: number;
}

export interface GenerateFromKeysParams {
  filename: string;
  address: string;
  viewKey: string;
  restoreHeight: number;
  password: string;
}

/**
 * Map any failure of a call to a WalletEngineError.
 * A JSON-RPC error object means the engine refused; anything else means it
 * could not be reached.
 */
export function toEngineError(method: string, err: unknown): WalletEngineError {
  if (err instanceof WalletEngineError) {
    return err;
  }
  if (err instanceof BaseError) {
    const rpcError = err.walk((e) => e instanceof RpcRequestError);
    if (rpcError instanceof RpcRequestError) {
      return new WalletEngineError('rejected', rpcError.details, { method, rpcCode: rpcError.code, cause: err });
    }
    return new WalletEngineError('unavailable', err.shortMessage, { method, cause: err });
  }
  return new WalletEngineError('unavailable', describeError(err), { method, cause: err });
}

export class WalletRpcClient {
  readonly url: string;
  private readonly client: RpcTransport;
  private readonly scanClient: RpcTransport;
  private readonly logger: Logger;

  constructor(opts: WalletRpcClientOptions) {
    this.url = opts.url;
    this.client = createRpcTransport(opts.url, opts.timeoutMs ?? 120_000);
    this.scanClient = createRpcTransport(opts.url, opts.scanTimeoutMs ?? 3_600_000);
    this.logger = opts.logger ?? silentLogger;
  }

  async getVersion(): Promise<number> {
    const result = await this.call('get_version', {}, VersionResultSchema);
    return result.version;
  }

  getBalance() {
    return this.call('get_balance', { account_index: 0 }, BalanceResultSchema);
  }

  async getHeight(): Promise<number> {
    const result = await this.call('get_height', {}, HeightResultSchema);
    return result.height;
  }

  refresh(startHeight?: number) {
    const params = startHeight === undefined ? {} : { start_height: startHeight };
    return this.call('refresh', params, RefreshResultSchema, this.scanClient);
  }

  async exportOutputs(all: boolean): Promise<string> {
    const result = await this.call('export_outputs', { all }, ExportOutputsResultSchema);
    return result.outputs_data_hex;
  }

  transfer(params: TransferParams) {
    return this.call(
      'transfer',
      {
        // JSON number: exact up to 2^53 atomic units
        destinations: [{ address: params.destination, amount: Number(params.amountAtomic) }],
        priority: params.priority,
        do_not_relay: true,
        get_tx_key: true,
        get_tx_metadata: true,
      },
      TransferResultSchema,
    );
  }

  async submitTransfer(txDataHex: string): Promise<string[]> {
    const result = await this.call('submit_transfer', { tx_data_hex: txDataHex }, SubmitTransferResultSchema);
    return result.tx_hash_list;
  }

  importKeyImages(signedKeyImages: Array<{ key_image: string; signature: string }>, offset: number) {
    return this.call(
      'import_key_images',
      { signed_key_images: signedKeyImages, offset },
      ImportKeyImagesResultSchema,
    );
  }

  getTransfers(minHeight: number) {
    return this.call(
      'get_transfers',
      {
        in: true,
        out: true,
        pending: true,
        pool: true,
        filter_by_height: minHeight > 0,
        min_height: minHeight,
      },
      GetTransfersResultSchema,
    );
  }

  async getTransferByTxid(txid: string) {
    const result = await this.call('get_transfer_by_txid', { txid }, GetTransferByTxidResultSchema);
    return result.transfer;
  }

  generateFromKeys(params: GenerateFromKeysParams) {
    return this.call(
      'generate_from_keys',
      {
        filename: params.filename,
        address: params.address,
        viewkey: params.viewKey,
        password: params.password,
        restore_height: params.restoreHeight,
        autosave_current: true,
      },
      GenerateFromKeysResultSchema,
    );
  }

  async openWallet(filename: string, password: string): Promise<void> {
    await this.call('open_wallet', { filename, password }, EmptyResultSchema);
  }

  async importOutputs(outputsDataHex: string): Promise<number> {
    const result = await this.call('import_outputs', { outputs_data_hex: outputsDataHex }, ImportOutputsResultSchema);
    return result.num_imported;
  }

  signTransfer(unsignedTxset: string) {
    return this.call('sign_transfer', { unsigned_txset: unsignedTxset }, SignTransferResultSchema);
  }

  exportKeyImages(all: boolean) {
    return this.call('export_key_images', { all }, ExportKeyImagesResultSchema);
  }

  private async call<S extends z.ZodTypeAny>(
    method: WalletRpcMethod,
    params: Record<string, unknown>,
    schema: S,
    client: RpcTransport = this.client,
  ): Promise<z.output<S>> {
    this.logger.debug('rpc_call', { method });

    let raw: unknown;
    try {
      raw = await client.request({ method, params });
    } catch (err) {
      const engineError = toEngineError(method, err);
      this.logger.warn('rpc_failed', { method, reason: engineError.reason, error: engineError.message });
      throw engineError;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid result';
      throw new WalletEngineError('unavailable', `Unexpected ${method} result: ${where}`, { method });
    }
    return parsed.data;
  }
}
