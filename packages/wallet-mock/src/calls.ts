import { WalletEngineError } from '@coldmesh/wallet-rpc';

/**
 * Call counters and scripted failures shared by the mock wallets.
 */
export class CallRecorder {
  private readonly counts = new Map<string, number>();
  private readonly failures = new Map<string, WalletEngineError[]>();
  /** When true every call fails as if the engine process were down */
  offline = false;

  count(method: string): number {
    return this.counts.get(method) ?? 0;
  }

  /** Make the next call of `method` throw `error` (queued, one per call) */
  failNext(method: string, error: WalletEngineError): void {
    const queued = this.failures.get(method) ?? [];
    queued.push(error);
    this.failures.set(method, queued);
  }

  enter(method: string): void {
    this.counts.set(method, this.count(method) + 1);
    if (this.offline) {
      throw new WalletEngineError('unavailable', 'connect ECONNREFUSED 127.0.0.1:18082', { method });
    }
    const failure = this.failures.get(method)?.shift();
    if (failure) {
      throw failure;
    }
  }
}
