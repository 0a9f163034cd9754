/**
 * Wallet Engine Contract
 *
 * The relay holds a view-only wallet per operator (it can see incoming funds
 * and build unsigned transfers, never spend). The cold side holds the full
 * wallet and only ever signs. Both sides talk to the engine through these
 * interfaces; amounts are atomic units.
 */

export interface WalletBalance {
  balanceAtomic: bigint;
  unlockedAtomic: bigint;
  blocksToUnlock: number;
}

export interface CreateUnsignedParams {
  destination: string;
  amountAtomic: bigint;
  /** 0 (default) to 3 (highest) */
  priority: number;
}

export interface UnsignedTransfer {
  /** Hex artifact handed to the signer */
  unsignedTxset: string;
  /** Identity of this construction; a signature must come back for the same key */
  txKey: string;
  amountAtomic: bigint;
  feeAtomic: bigint;
}

export interface TransferRecord {
  hash: string;
  height: number;
  timestamp: number;
  amountAtomic: bigint;
  feeAtomic: bigint;
  direction: 'in' | 'out';
  confirmations: number;
  address?: string;
}

/** What the engine reads out of a signed artifact */
export interface SignedIdentity {
  /** txKey of the construction the signature was made for */
  txKey: string;
}

export interface KeyImage {
  keyImage: string;
  signature: string;
}

export interface KeyImageImport {
  height: number;
  spentAtomic: bigint;
  unspentAtomic: bigint;
}

/** View-only wallet of one operator */
export interface ViewWallet {
  readonly name: string;
  /** Pull new blocks; with `startHeight`, rescan from there */
  refresh(startHeight?: number): Promise<void>;
  getBalance(): Promise<WalletBalance>;
  getHeight(): Promise<number>;
  exportOutputs(all: boolean): Promise<string>;
  createUnsigned(params: CreateUnsignedParams): Promise<UnsignedTransfer>;
  /** Identity embedded in a signed artifact; rejects when there is none to read */
  describeSigned(signedTxset: string): Promise<SignedIdentity>;
  /** Broadcast a signed artifact; returns the transaction hashes */
  submitSigned(signedTxset: string): Promise<string[]>;
  importKeyImages(keyImages: KeyImage[], offset: number): Promise<KeyImageImport>;
  getTransfers(minHeight: number): Promise<TransferRecord[]>;
  /** null when the engine does not know the hash */
  getTransferByHash(hash: string): Promise<TransferRecord | null>;
}

export interface ProvisionParams {
  walletName: string;
  address: string;
  viewKey: string;
  restoreHeight: number;
}

/** Creates and reopens view-only wallets */
export interface WalletHost {
  provision(params: ProvisionParams): Promise<ViewWallet>;
  /** Handle to an already provisioned wallet; opened lazily on first use */
  open(walletName: string): ViewWallet;
}

export interface SignedTransfer {
  signedTxset: string;
  txHashes: string[];
}

export interface KeyImageExport {
  offset: number;
  keyImages: KeyImage[];
}

/** Full wallet on the cold side */
export interface SigningWallet {
  /** Returns the number of outputs imported */
  importOutputs(outputsDataHex: string): Promise<number>;
  signTransfer(unsignedTxset: string): Promise<SignedTransfer>;
  exportKeyImages(all: boolean): Promise<KeyImageExport>;
}
