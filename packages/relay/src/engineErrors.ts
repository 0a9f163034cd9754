import { ProtocolError, describeError, type ErrorCode } from '@coldmesh/protocol';
import { isInsufficientFunds, isWalletEngineError } from '@coldmesh/wallet-rpc';

export interface RequestContext {
  operatorId: string;
  requestId: string;
}

/**
 * Translate a wallet-engine failure into the protocol's taxonomy.
 * An unreachable engine is always ENGINE_UNAVAILABLE; an engine refusal
 * becomes `rejectedCode` with the engine's message verbatim.
 */
export function engineFailure(err: unknown, rejectedCode: ErrorCode, ctx: RequestContext): ProtocolError {
  if (err instanceof ProtocolError) {
    return err;
  }
  if (isWalletEngineError(err)) {
    if (err.reason === 'unavailable') {
      return new ProtocolError('ENGINE_UNAVAILABLE', `Wallet engine unavailable: ${err.message}`, { ...ctx, cause: err });
    }
    return new ProtocolError(rejectedCode, err.message, { ...ctx, cause: err });
  }
  return new ProtocolError('ENGINE_UNAVAILABLE', `Wallet engine call failed: ${describeError(err)}`, { ...ctx, cause: err });
}

/** Construction refusals split into funds and everything else */
export function constructionFailure(err: unknown, ctx: RequestContext): ProtocolError {
  return engineFailure(err, isInsufficientFunds(err) ? 'INSUFFICIENT_FUNDS' : 'CONSTRUCTION_ERROR', ctx);
}
