/**
 * Responder-side replay cache
 *
 * A request is identified by (operatorId, requestId, kind). The first
 * delivery runs the handler; duplicates arriving while it runs share its
 * promise, and duplicates arriving later get the stored response bytes. The
 * handler is never run twice for a cached key.
 *
 * Responses the caller marks as not cacheable (transient refusals) are
 * forgotten as soon as they settle so a later retry is processed afresh.
 */

export interface ReplayKey {
  operatorId: string;
  requestId: string;
  kind: string;
}

/** Encoded response and the kind it was encoded from */
export interface ReplayOutcome {
  kind: string;
  bytes: Uint8Array;
  cacheable: boolean;
}

type ReplayEntry =
  | { state: 'pending'; promise: Promise<ReplayOutcome> }
  | { state: 'done'; kind: string; bytes: Uint8Array; completedAt: number };

export interface ReplayCacheOptions {
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
}

export interface ReplayResult {
  kind: string;
  bytes: Uint8Array;
  /** true when the handler did not run for this delivery */
  replayed: boolean;
}

export class ReplayCache {
  private entries = new Map<string, ReplayEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(opts: ReplayCacheOptions) {
    this.ttlMs = opts.ttlMs;
    this.maxEntries = opts.maxEntries;
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  async run(key: ReplayKey, handler: () => Promise<ReplayOutcome>): Promise<ReplayResult> {
    const id = replayId(key);
    const existing = this.entries.get(id);

    if (existing?.state === 'done') {
      if (this.now() - existing.completedAt <= this.ttlMs) {
        return { kind: existing.kind, bytes: existing.bytes, replayed: true };
      }
      this.entries.delete(id);
    } else if (existing?.state === 'pending') {
      const outcome = await existing.promise;
      return { kind: outcome.kind, bytes: outcome.bytes, replayed: true };
    }

    const promise = handler();
    this.entries.set(id, { state: 'pending', promise });

    let outcome: ReplayOutcome;
    try {
      outcome = await promise;
    } catch (err) {
      this.entries.delete(id);
      throw err;
    }

    this.entries.delete(id);
    if (outcome.cacheable) {
      this.entries.set(id, { state: 'done', kind: outcome.kind, bytes: outcome.bytes, completedAt: this.now() });
      this.enforceLimit();
    }
    return { kind: outcome.kind, bytes: outcome.bytes, replayed: false };
  }

  /** Stored response for a key, if one is cached and fresh. */
  peek(key: ReplayKey): Uint8Array | undefined {
    const entry = this.entries.get(replayId(key));
    if (entry?.state !== 'done' || this.now() - entry.completedAt > this.ttlMs) {
      return undefined;
    }
    return entry.bytes;
  }

  /** Drop completed entries past their TTL; returns how many were dropped. */
  sweep(): number {
    const cutoff = this.now() - this.ttlMs;
    let dropped = 0;
    for (const [id, entry] of this.entries) {
      if (entry.state === 'done' && entry.completedAt < cutoff) {
        this.entries.delete(id);
        dropped++;
      }
    }
    return dropped;
  }

  // Map iteration follows insertion order and completed entries are
  // re-inserted on completion, so the first completed entry is the oldest.
  private enforceLimit() {
    for (const [id, entry] of this.entries) {
      if (this.entries.size <= this.maxEntries) return;
      if (entry.state === 'done') {
        this.entries.delete(id);
      }
    }
  }
}

function replayId(key: ReplayKey): string {
  return JSON.stringify([key.operatorId, key.requestId, key.kind]);
}
