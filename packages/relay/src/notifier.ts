import { describeError, silentLogger, type Logger, type StatusEvent, type StatusMessage } from '@coldmesh/protocol';
import type { OperatorSession } from './sessions.js';

export interface StatusSink {
  push(destination: string, status: StatusMessage): Promise<void>;
}

export interface StatusExtras {
  txHash?: string;
  amount?: string;
}

/**
 * Best-effort status pushes to the address an operator last wrote from.
 * Nothing acknowledges them; a failed push is logged and forgotten.
 */
export class StatusNotifier {
  private counter = 0;

  constructor(
    private readonly sink: StatusSink,
    private readonly now: () => number = Date.now,
    private readonly logger: Logger = silentLogger,
  ) {}

  notify(session: OperatorSession, event: StatusEvent, message: string, extras: StatusExtras = {}): void {
    const destination = session.lastSeen;
    if (!destination) {
      this.logger.debug('status_unaddressed', { operatorId: session.operatorId, event });
      return;
    }

    this.counter += 1;
    const timestamp = this.now();
    const status: StatusMessage = {
      kind: 'status',
      operatorId: session.operatorId,
      requestId: `push-${timestamp.toString(36)}-${this.counter}`,
      event,
      message,
      timestamp,
      ...extras,
    };

    this.logger.info('status_push', { operatorId: session.operatorId, event, destination });
    this.sink.push(destination, status).catch((err) => {
      this.logger.warn('status_push_failed', { operatorId: session.operatorId, event, error: describeError(err) });
    });
  }
}
