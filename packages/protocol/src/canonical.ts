/**
 * Canonical JSON Serialization
 *
 * Used wherever two values must compare equal by content: credential
 * fingerprints on the relay and artifact digests. Identical values always
 * produce identical strings, whatever the key order they were built with.
 *
 * Rules:
 * - Object keys are sorted lexicographically (Unicode code point order)
 * - Arrays preserve their element order
 * - undefined values are rejected (throw error)
 * - Numbers must be safe integers; bigints are written as decimal strings
 */

import { createHash } from 'crypto';

export function canonicalize(value: unknown): unknown {
  if (value === undefined) {
    throw new Error('Canonical serialization does not allow undefined values');
  }

  if (value === null) {
    return null;
  }

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new Error(`Number ${value} is not a safe integer`);
    }
    return value;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }

  const fields = new Map<string, unknown>(Object.entries(value));
  const result: Record<string, unknown> = {};

  for (const key of [...fields.keys()].sort()) {
    const v = fields.get(key);
    if (v === undefined) {
      throw new Error(`Canonical serialization does not allow undefined values (key: ${key})`);
    }
    result[key] = canonicalize(v);
  }

  return result;
}

export function canonicalStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

/**
 * SHA-256 of the canonical form, lowercase hex (64 chars).
 */
export function canonicalDigest(value: unknown): string {
  return createHash('sha256').update(canonicalStringify(value), 'utf8').digest('hex');
}
