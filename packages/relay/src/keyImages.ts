/**
 * Key-Image Reconciler
 *
 * A view-only wallet cannot tell which of its outputs were spent until the
 * cold side exports the key images. Every broadcast opens a batch (its id is
 * the transaction's request id); the operator's balance is stale while any
 * batch is unapplied. One import carries the full key-image set, so applying
 * a batch also applies every batch opened before it. An import that
 * carries no key images cannot cover a broadcast's spend and applies
 * nothing while a broadcast batch is open.
 */

export interface KeyImageImportResult {
  height: number;
  spentAtomic: bigint;
  unspentAtomic: bigint;
}

/** Who opened a batch: a broadcast waiting for its key images, or an import under a fresh id */
export type BatchOrigin = 'broadcast' | 'import';

export interface KeyImageBatch {
  readonly operatorId: string;
  readonly batchId: string;
  readonly origin: BatchOrigin;
  /** When the cold side exported the images (epoch ms), once known */
  exportedAt: number | null;
  applied: boolean;
  result: KeyImageImportResult | null;
  readonly openedAt: number;
}

export interface KeyImageLedgerOptions {
  /** Applied batches kept for lookups (default 256) */
  historySize?: number;
  now?: () => number;
}

export class KeyImageLedger {
  private readonly batches = new Map<string, KeyImageBatch>();
  private readonly historySize: number;
  private readonly now: () => number;

  constructor(
    readonly operatorId: string,
    opts: KeyImageLedgerOptions = {},
  ) {
    this.historySize = opts.historySize ?? 256;
    this.now = opts.now ?? Date.now;
  }

  /** Register a batch; an existing batch is returned unchanged except for a newly learned export time */
  open(batchId: string, origin: BatchOrigin, exportedAt: number | null = null): KeyImageBatch {
    const existing = this.batches.get(batchId);
    if (existing) {
      if (existing.exportedAt === null && exportedAt !== null) {
        existing.exportedAt = exportedAt;
      }
      return existing;
    }
    const batch: KeyImageBatch = {
      operatorId: this.operatorId,
      batchId,
      origin,
      exportedAt,
      applied: false,
      result: null,
      openedAt: this.now(),
    };
    this.batches.set(batchId, batch);
    return batch;
  }

  get(batchId: string): KeyImageBatch | undefined {
    return this.batches.get(batchId);
  }

  isStale(): boolean {
    return this.unapplied().length > 0;
  }

  unapplied(): KeyImageBatch[] {
    return [...this.batches.values()].filter((batch) => !batch.applied);
  }

  /** Unapplied batches a broadcast opened */
  awaitingSpends(): KeyImageBatch[] {
    return this.unapplied().filter((batch) => batch.origin === 'broadcast');
  }

  /**
   * Mark `batchId` and every batch opened before it applied.
   * @returns the batches that changed
   */
  markApplied(batchId: string, result: KeyImageImportResult): KeyImageBatch[] {
    const target = this.batches.get(batchId);
    if (!target) {
      throw new Error(`Unknown key-image batch ${batchId}`);
    }

    const changed: KeyImageBatch[] = [];
    for (const batch of this.batches.values()) {
      if (!batch.applied) {
        batch.applied = true;
        batch.result = result;
        changed.push(batch);
      }
      if (batch === target) break;
    }
    this.prune();
    return changed;
  }

  private prune() {
    let excess = this.batches.size - this.historySize;
    for (const [id, batch] of this.batches) {
      if (excess <= 0) break;
      if (batch.applied) {
        this.batches.delete(id);
        excess--;
      }
    }
  }
}
