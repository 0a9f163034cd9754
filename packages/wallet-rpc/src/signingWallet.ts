import type { KeyImageExport, SignedTransfer, SigningWallet } from './engine.js';
import type { WalletRpcClient } from './rpcClient.js';
import { sealSigned } from './sealed.js';

/**
 * Cold-side wallet on an offline wallet-rpc process that already has the
 * full wallet open. Signed sets come back sealed to the unsigned set they
 * were made from.
 */
export class RpcSigningWallet implements SigningWallet {
  constructor(private readonly rpc: WalletRpcClient) {}

  importOutputs(outputsDataHex: string): Promise<number> {
    return this.rpc.importOutputs(outputsDataHex);
  }

  async signTransfer(unsignedTxset: string): Promise<SignedTransfer> {
    const result = await this.rpc.signTransfer(unsignedTxset);
    return { signedTxset: sealSigned(unsignedTxset, result.signed_txset), txHashes: result.tx_hash_list };
  }

  async exportKeyImages(all: boolean): Promise<KeyImageExport> {
    const result = await this.rpc.exportKeyImages(all);
    return {
      offset: result.offset,
      keyImages: result.signed_key_images.map((k) => ({ keyImage: k.key_image, signature: k.signature })),
    };
  }
}
