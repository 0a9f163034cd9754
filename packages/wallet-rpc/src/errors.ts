/**
 * Wallet engine failures
 *
 * `rejected`: the engine answered and refused the call (its message is kept
 * verbatim). `unavailable`: no usable answer (connection, timeout, HTTP
 * error or a result that does not match the expected shape).
 */

export type EngineFailure = 'rejected' | 'unavailable';

export interface WalletEngineErrorContext {
  method: string;
  rpcCode?: number;
  cause?: unknown;
}

export class WalletEngineError extends Error {
  readonly reason: EngineFailure;
  readonly method: string;
  readonly rpcCode: number | undefined;

  constructor(reason: EngineFailure, message: string, context: WalletEngineErrorContext) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'WalletEngineError';
    this.reason = reason;
    this.method = context.method;
    this.rpcCode = context.rpcCode;
  }
}

export function isWalletEngineError(err: unknown): err is WalletEngineError {
  return err instanceof WalletEngineError;
}

const NOT_ENOUGH_MONEY = /not enough (?:unlocked )?money/i;

/** The engine refused a construction because the funds (or unlocked funds) do not cover it */
export function isInsufficientFunds(err: unknown): boolean {
  return isWalletEngineError(err) && err.reason === 'rejected' && NOT_ENOUGH_MONEY.test(err.message);
}
