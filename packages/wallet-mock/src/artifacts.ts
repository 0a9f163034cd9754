/**
 * Mock transaction artifacts
 *
 * Artifacts are hex-encoded JSON so tests can read them back. They carry
 * the construction's txKey, which is how the mock signer and the mock
 * broadcast tie a signature to the unsigned set it came from.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { WalletEngineError } from '@coldmesh/wallet-rpc';

const Atomic = z.string().regex(/^\d+$/);

export const UnsignedArtifactSchema = z.object({
  type: z.literal('unsigned'),
  wallet: z.string(),
  txKey: z.string(),
  destination: z.string(),
  amountAtomic: Atomic,
  feeAtomic: Atomic,
});

export const SignedArtifactSchema = UnsignedArtifactSchema.extend({
  type: z.literal('signed'),
  signer: z.string(),
});

export type UnsignedArtifact = z.infer<typeof UnsignedArtifactSchema>;
export type SignedArtifact = z.infer<typeof SignedArtifactSchema>;

export function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

export function encodeArtifact(artifact: UnsignedArtifact | SignedArtifact): string {
  return Buffer.from(JSON.stringify(artifact), 'utf8').toString('hex');
}

/** JSON carried as hex; null when it is not */
export function decodeJsonHex(hex: string): unknown {
  if (!/^(?:[0-9a-f]{2})+$/.test(hex)) return null;
  try {
    return JSON.parse(Buffer.from(hex, 'hex').toString('utf8'));
  } catch {
    return null;
  }
}

export function decodeUnsigned(hex: string, method: string): UnsignedArtifact {
  const parsed = UnsignedArtifactSchema.safeParse(decodeJsonHex(hex));
  if (!parsed.success) {
    throw new WalletEngineError('rejected', 'Failed to parse unsigned transaction set', { method });
  }
  return parsed.data;
}

export function decodeSigned(hex: string, method: string): SignedArtifact {
  const parsed = SignedArtifactSchema.safeParse(decodeJsonHex(hex));
  if (!parsed.success) {
    throw new WalletEngineError('rejected', 'Failed to parse signed tx data', { method });
  }
  return parsed.data;
}

/** Hash the mock network assigns to a signed artifact */
export function signedTxHash(signedTxset: string): string {
  return sha256Hex(`tx:${signedTxset}`);
}
