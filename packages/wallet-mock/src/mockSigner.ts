import { z } from 'zod';
import type { KeyImage, KeyImageExport, SignedTransfer, SigningWallet } from '@coldmesh/wallet-rpc';
import { WalletEngineError } from '@coldmesh/wallet-rpc';
import { decodeJsonHex, decodeUnsigned, encodeArtifact, sha256Hex, signedTxHash } from './artifacts.js';
import { CallRecorder } from './calls.js';

const OutputsExportSchema = z.object({
  type: z.literal('outputs'),
  wallet: z.string(),
  count: z.number().int().nonnegative(),
});

/** Key image the mock signer reports for the outputs a construction spent */
export function mockKeyImage(txKey: string): KeyImage {
  return {
    keyImage: sha256Hex(`key-image:${txKey}`),
    signature: sha256Hex(`ki-sig-c:${txKey}`) + sha256Hex(`ki-sig-r:${txKey}`),
  };
}

/**
 * Full wallet on the cold side. Signs anything it can parse and remembers
 * what it signed so key-image exports cover those spends.
 */
export class MockSigningWallet implements SigningWallet {
  readonly calls = new CallRecorder();
  outputsImported = 0;
  private readonly signedKeys: string[] = [];
  private exported = 0;

  constructor(readonly name = 'cold-wallet') {}

  async importOutputs(outputsDataHex: string): Promise<number> {
    this.calls.enter('importOutputs');
    const parsed = OutputsExportSchema.safeParse(decodeJsonHex(outputsDataHex));
    if (!parsed.success) {
      throw new WalletEngineError('rejected', 'Failed to import outputs', { method: 'import_outputs' });
    }
    this.outputsImported += parsed.data.count;
    return parsed.data.count;
  }

  async signTransfer(unsignedTxset: string): Promise<SignedTransfer> {
    this.calls.enter('signTransfer');
    const unsigned = decodeUnsigned(unsignedTxset, 'sign_transfer');
    const signedTxset = encodeArtifact({ ...unsigned, type: 'signed', signer: this.name });
    this.signedKeys.push(unsigned.txKey);
    return { signedTxset, txHashes: [signedTxHash(signedTxset)] };
  }

  /** With `all` every key image; otherwise only those not exported yet */
  async exportKeyImages(all: boolean): Promise<KeyImageExport> {
    this.calls.enter('exportKeyImages');
    const offset = all ? 0 : this.exported;
    const keyImages = this.signedKeys.slice(offset).map(mockKeyImage);
    this.exported = this.signedKeys.length;
    return { offset, keyImages };
  }
}
