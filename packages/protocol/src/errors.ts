/**
 * Protocol Error Taxonomy
 *
 * Every failure that crosses a component boundary is a ProtocolError with one
 * of the codes below. Errors that answer a request carry its request id so
 * the sender can match them against its own pending operation.
 */

import { z } from 'zod';

export const ErrorCodeSchema = z.enum([
  'MALFORMED',
  'UNKNOWN_KIND',
  'UNAUTHORIZED',
  'TIMEOUT',
  'INSUFFICIENT_FUNDS',
  'CONSTRUCTION_ERROR',
  'SIGNATURE_MISMATCH',
  'STALE_BALANCE',
  'BROADCAST_REJECTED',
  'EXPIRED',
  'ENGINE_UNAVAILABLE',
]);

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

/**
 * Codes describing a condition that may clear on its own (a provisioning
 * that has not happened yet, key images not yet imported, an unreachable
 * wallet engine). Responses carrying them are never replayed from cache.
 */
const TRANSIENT_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'MALFORMED',
  'UNKNOWN_KIND',
  'UNAUTHORIZED',
  'TIMEOUT',
  'SIGNATURE_MISMATCH',
  'STALE_BALANCE',
  'ENGINE_UNAVAILABLE',
]);

export function isTransientCode(code: ErrorCode): boolean {
  return TRANSIENT_CODES.has(code);
}

export interface ProtocolErrorContext {
  requestId?: string;
  operatorId?: string;
  cause?: unknown;
}

export class ProtocolError extends Error {
  readonly code: ErrorCode;
  readonly requestId: string | undefined;
  readonly operatorId: string | undefined;

  constructor(code: ErrorCode, message: string, context: ProtocolErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'ProtocolError';
    this.code = code;
    this.requestId = context.requestId;
    this.operatorId = context.operatorId;
  }

  /** Copy of this error bound to a request, keeping code and message. */
  withRequest(operatorId: string, requestId: string): ProtocolError {
    return new ProtocolError(this.code, this.message, { operatorId, requestId, cause: this.cause });
  }
}

export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
