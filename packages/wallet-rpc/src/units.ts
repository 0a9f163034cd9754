/**
 * XMR Amount Conversion
 *
 * The wallet engine counts atomic units (1 XMR = 10^12); messages carry
 * decimal XMR strings.
 */

import { formatUnits, parseUnits } from 'viem';
import { XmrAmountSchema } from '@coldmesh/protocol';

export const XMR_DECIMALS = 12;

/** 1500120000000n -> "1.50012" */
export function formatXmr(atomic: bigint): string {
  if (atomic < 0n) {
    throw new Error(`Amount must not be negative, got ${atomic}`);
  }
  return formatUnits(atomic, XMR_DECIMALS);
}

/**
 * "1.5" -> 1500000000000n
 * @throws Error if the string is not a non-negative amount with at most 12 decimals
 */
export function parseXmr(amount: string): bigint {
  if (!XmrAmountSchema.safeParse(amount).success) {
    throw new Error(`Invalid XMR amount: ${amount}`);
  }
  return parseUnits(amount, XMR_DECIMALS);
}
