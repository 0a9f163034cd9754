/**
 * Hex Validation Utilities
 *
 * Wallet-engine values travel as bare lowercase hex (no 0x prefix):
 * - keys and transaction hashes are exactly 32 bytes (64 hex chars)
 * - transaction artifacts and exported outputs are hex blobs of any even length
 */

import { z } from 'zod';

const HEX32_REGEX = /^[0-9a-f]{64}$/;
const HEX_BLOB_REGEX = /^(?:[0-9a-f]{2})*$/;

/**
 * Assert that a string is a valid 32-byte bare hex value.
 * Throws with a descriptive error if validation fails.
 *
 * @param name - Name of the field (for error messages)
 */
export function assertHex32(name: string, value: unknown): asserts value is string {
  if (typeof value !== 'string') {
    throw new Error(`${name} must be a string, got ${typeof value}`);
  }

  if (value.length !== 64) {
    throw new Error(`${name} must be exactly 32 bytes (64 hex chars), got ${value.length} chars`);
  }

  if (!HEX32_REGEX.test(value)) {
    throw new Error(`${name} must be lowercase hex (0-9a-f) only, got: ${value.slice(0, 20)}...`);
  }
}

export function isHexBlob(value: string): boolean {
  return HEX_BLOB_REGEX.test(value);
}

/** Zod schema for a 32-byte key or hash. */
export const Hex32Schema = z
  .string()
  .length(64, 'Must be exactly 64 hex characters (32 bytes)')
  .regex(HEX32_REGEX, 'Must be lowercase hex (32 bytes)');

export type Hex32 = z.infer<typeof Hex32Schema>;

/** Zod schema for a non-empty hex blob (artifacts, exported outputs). */
export const HexBlobSchema = z
  .string()
  .min(2, 'Must not be empty')
  .regex(HEX_BLOB_REGEX, 'Must be lowercase hex with an even number of characters');
