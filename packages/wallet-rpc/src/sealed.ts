/**
 * Sealed signed artifacts
 *
 * A view-only wallet cannot read a signed set, so the signer seals it: the
 * sha256 of the unsigned set it signed, then the engine's signed set, both
 * hex. The view side opens the seal to learn which construction the
 * signature belongs to and broadcasts only the inner set.
 */

import { createHash } from 'crypto';
import { WalletEngineError } from './errors.js';

const SEALED = /^([0-9a-f]{64})((?:[0-9a-f]{2})+)$/;

/** Identity of one construction: the digest of its unsigned set */
export function constructionKey(unsignedTxset: string): string {
  return createHash('sha256').update(unsignedTxset, 'utf8').digest('hex');
}

export function sealSigned(unsignedTxset: string, signedTxset: string): string {
  return constructionKey(unsignedTxset) + signedTxset;
}

export interface OpenedSeal {
  txKey: string;
  signedTxset: string;
}

export function openSealed(artifact: string, method: string): OpenedSeal {
  const match = SEALED.exec(artifact);
  const txKey = match?.[1];
  const signedTxset = match?.[2];
  if (txKey === undefined || signedTxset === undefined) {
    throw new WalletEngineError('rejected', 'Signed transaction is not sealed to an unsigned set', { method });
  }
  return { txKey, signedTxset };
}
