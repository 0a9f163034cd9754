/**
 * @coldmesh/wallet-rpc
 *
 * Wallet engine contracts and their JSON-RPC implementation.
 */

// Engine contracts
export type {
  CreateUnsignedParams,
  KeyImage,
  KeyImageExport,
  KeyImageImport,
  ProvisionParams,
  SignedIdentity,
  SignedTransfer,
  SigningWallet,
  TransferRecord,
  UnsignedTransfer,
  ViewWallet,
  WalletBalance,
  WalletHost,
} from './engine.js';

// Errors
export {
  WalletEngineError,
  isWalletEngineError,
  isInsufficientFunds,
  type EngineFailure,
  type WalletEngineErrorContext,
} from './errors.js';

// JSON-RPC client
export {
  WalletRpcClient,
  WALLET_RPC_METHODS,
  toEngineError,
  type WalletRpcClientOptions,
  type WalletRpcMethod,
  type TransferParams,
  type GenerateFromKeysParams,
} from './rpcClient.js';

// Implementations
export { RpcWalletHost, toTransferRecord, type RpcWalletHostOptions } from './walletHost.js';
export { constructionKey, openSealed, sealSigned, type OpenedSeal } from './sealed.js';
export { RpcSigningWallet } from './signingWallet.js';

// Amounts
export { formatXmr, parseXmr, XMR_DECIMALS } from './units.js';
