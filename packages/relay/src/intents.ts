/**
 * Transaction Intents
 *
 * One intent per create_transaction request id, moving forward only:
 *
 *   REQUESTED -> UNSIGNED_READY -> SIGNED -> SUBMITTED -> CONFIRMED
 *
 * FAILED and EXPIRED are reachable from any non-terminal state. Terminal
 * intents move to a bounded archive so late duplicates still find them.
 */

import type { ErrorCode } from '@coldmesh/protocol';
import type { UnsignedTransfer } from '@coldmesh/wallet-rpc';

export type IntentState =
  | 'REQUESTED'
  | 'UNSIGNED_READY'
  | 'SIGNED'
  | 'SUBMITTED'
  | 'CONFIRMED'
  | 'FAILED'
  | 'EXPIRED';

const TRANSITIONS: Record<IntentState, readonly IntentState[]> = {
  REQUESTED: ['UNSIGNED_READY', 'FAILED', 'EXPIRED'],
  UNSIGNED_READY: ['SIGNED', 'FAILED', 'EXPIRED'],
  SIGNED: ['SUBMITTED', 'FAILED', 'EXPIRED'],
  SUBMITTED: ['CONFIRMED', 'FAILED', 'EXPIRED'],
  CONFIRMED: [],
  FAILED: [],
  EXPIRED: [],
};

/** States a TTL applies to: nothing has been signed yet */
const EXPIRABLE: ReadonlySet<IntentState> = new Set<IntentState>(['REQUESTED', 'UNSIGNED_READY']);

export function canTransition(from: IntentState, to: IntentState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: IntentState): boolean {
  return TRANSITIONS[state].length === 0;
}

export class IllegalTransitionError extends Error {
  constructor(
    readonly requestId: string,
    readonly from: IntentState,
    readonly to: IntentState,
  ) {
    super(`Intent ${requestId} cannot move from ${from} to ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export interface IntentFailure {
  code: ErrorCode;
  /** Engine message, verbatim where there is one */
  message: string;
}

export interface TransactionIntent {
  readonly operatorId: string;
  readonly requestId: string;
  readonly destination: string;
  readonly amountAtomic: bigint;
  readonly priority: number;
  state: IntentState;
  /** Dropped on expiry */
  unsigned: UnsignedTransfer | null;
  txKey: string | null;
  feeAtomic: bigint | null;
  totalAtomic: bigint | null;
  changeAtomic: bigint | null;
  /** sha256 of the accepted signed artifact */
  signedDigest: string | null;
  txHash: string | null;
  failure: IntentFailure | null;
  readonly createdAt: number;
  updatedAt: number;
  readonly expiresAt: number;
}

export interface NewIntent {
  operatorId: string;
  requestId: string;
  destination: string;
  amountAtomic: bigint;
  priority: number;
}

type IntentPatch = Partial<
  Pick<
    TransactionIntent,
    'unsigned' | 'txKey' | 'feeAtomic' | 'totalAtomic' | 'changeAtomic' | 'signedDigest' | 'txHash' | 'failure'
  >
>;

export interface IntentBookOptions {
  ttlMs: number;
  /** Terminal intents kept (default 1000) */
  archiveSize?: number;
  now?: () => number;
}

export class IntentBook {
  private readonly active = new Map<string, TransactionIntent>();
  private readonly archive = new Map<string, TransactionIntent>();
  private readonly ttlMs: number;
  private readonly archiveSize: number;
  private readonly now: () => number;

  constructor(opts: IntentBookOptions) {
    this.ttlMs = opts.ttlMs;
    this.archiveSize = opts.archiveSize ?? 1000;
    this.now = opts.now ?? Date.now;
  }

  get(requestId: string): TransactionIntent | undefined {
    return this.active.get(requestId) ?? this.archive.get(requestId);
  }

  /** Intents not yet terminal */
  get activeCount(): number {
    return this.active.size;
  }

  open(params: NewIntent): TransactionIntent {
    if (this.get(params.requestId)) {
      throw new Error(`Intent ${params.requestId} already exists`);
    }
    const now = this.now();
    const intent: TransactionIntent = {
      ...params,
      state: 'REQUESTED',
      unsigned: null,
      txKey: null,
      feeAtomic: null,
      totalAtomic: null,
      changeAtomic: null,
      signedDigest: null,
      txHash: null,
      failure: null,
      createdAt: now,
      updatedAt: now,
      expiresAt: now + this.ttlMs,
    };
    this.active.set(intent.requestId, intent);
    return intent;
  }

  /**
   * Forget an intent that never got past REQUESTED, so the same request id
   * can be processed afresh.
   */
  discard(intent: TransactionIntent): void {
    if (intent.state !== 'REQUESTED') {
      throw new IllegalTransitionError(intent.requestId, intent.state, 'REQUESTED');
    }
    this.active.delete(intent.requestId);
  }

  transition(intent: TransactionIntent, to: IntentState, patch: IntentPatch = {}): void {
    if (!canTransition(intent.state, to)) {
      throw new IllegalTransitionError(intent.requestId, intent.state, to);
    }
    Object.assign(intent, patch);
    intent.state = to;
    intent.updatedAt = this.now();
    if (isTerminal(to)) {
      this.retire(intent);
    }
  }

  fail(intent: TransactionIntent, code: ErrorCode, message: string): void {
    this.transition(intent, 'FAILED', { failure: { code, message } });
  }

  /** Expire `intent` if its TTL has passed; true when it is (now) EXPIRED */
  checkExpiry(intent: TransactionIntent): boolean {
    if (intent.state === 'EXPIRED') return true;
    if (!EXPIRABLE.has(intent.state) || this.now() < intent.expiresAt) return false;
    this.transition(intent, 'EXPIRED', { unsigned: null });
    return true;
  }

  /** Expire every intent whose TTL has passed; returns those expired */
  expireDue(): TransactionIntent[] {
    const expired: TransactionIntent[] = [];
    for (const intent of [...this.active.values()]) {
      if (EXPIRABLE.has(intent.state) && this.checkExpiry(intent)) {
        expired.push(intent);
      }
    }
    return expired;
  }

  inState(state: IntentState): TransactionIntent[] {
    return [...this.active.values()].filter((intent) => intent.state === state);
  }

  private retire(intent: TransactionIntent) {
    this.active.delete(intent.requestId);
    this.archive.set(intent.requestId, intent);
    while (this.archive.size > this.archiveSize) {
      const oldest = this.archive.keys().next();
      if (oldest.done) break;
      this.archive.delete(oldest.value);
    }
  }
}
