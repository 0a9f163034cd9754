/**
 * Confirmation Watcher
 *
 * Polls the engine for every SUBMITTED intent and moves it to CONFIRMED once
 * its transfer has the configured number of confirmations. Advisory only:
 * nothing waits on it and a failed poll is retried on the next round.
 */

import { describeError, silentLogger, type Logger } from '@coldmesh/protocol';
import { formatXmr } from '@coldmesh/wallet-rpc';
import type { StatusNotifier } from './notifier.js';
import type { SessionRegistry } from './sessions.js';

export interface ConfirmationWatcherOptions {
  registry: SessionRegistry;
  notifier: StatusNotifier;
  confirmations: number;
  pollMs: number;
  logger?: Logger;
}

export class ConfirmationWatcher {
  private readonly opts: ConfirmationWatcherOptions;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(opts: ConfirmationWatcherOptions) {
    this.opts = opts;
    this.logger = opts.logger ?? silentLogger;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** One polling round over every operator; returns how many intents were confirmed */
  async poll(): Promise<number> {
    let confirmed = 0;
    for (const session of this.opts.registry.all()) {
      const submitted = session.intents.inState('SUBMITTED');
      if (submitted.length === 0) continue;

      await session.queue.run(async () => {
        for (const intent of submitted) {
          if (intent.state !== 'SUBMITTED' || !intent.txHash) continue;
          try {
            const transfer = await session.wallet.getTransferByHash(intent.txHash);
            if (!transfer || transfer.confirmations < this.opts.confirmations) continue;

            session.intents.transition(intent, 'CONFIRMED');
            confirmed++;
            this.logger.info('tx_confirmed', {
              operatorId: session.operatorId,
              requestId: intent.requestId,
              txHash: intent.txHash,
              confirmations: transfer.confirmations,
            });
            this.opts.notifier.notify(session, 'tx_confirmed', `Transaction has ${transfer.confirmations} confirmations`, {
              txHash: intent.txHash,
              amount: formatXmr(intent.amountAtomic),
            });
          } catch (err) {
            this.logger.warn('confirmation_poll_failed', {
              operatorId: session.operatorId,
              txHash: intent.txHash,
              error: describeError(err),
            });
          }
        }
      });
    }
    return confirmed;
  }

  private schedule() {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.poll()
        .catch((err) => this.logger.error('confirmation_round_failed', { error: describeError(err) }))
        .finally(() => this.schedule());
    }, this.opts.pollMs);
    this.timer.unref();
  }
}
