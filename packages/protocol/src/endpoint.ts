/**
 * Reliable Endpoint
 *
 * Request/response exchange over a lossy mesh. Outgoing messages are
 * fragmented to the MTU; incoming fragments are reassembled and decoded.
 *
 * - Senders resend a request on silence following the backoff policy and
 *   match the answer by (operatorId, requestId) and the expected response
 *   kind. An `error` answer rejects with a ProtocolError carrying its code.
 * - Responders run each (operatorId, requestId, kind) once through the
 *   replay cache and re-send the stored answer to duplicates.
 * - Status pushes are fire-and-forget.
 */

import { encodeMessage, decodeMessage } from './codec.js';
import { backoffDelay, type BackoffPolicy } from './backoff.js';
import { describeError, isProtocolError, isTransientCode, ProtocolError } from './errors.js';
import { decodeFragment, fragmentPayload, Reassembler, type FragmentKey } from './fragments.js';
import { silentLogger, type Logger } from './log.js';
import {
  isRequest,
  isRequestKind,
  RESPONSE_KIND,
  type ErrorMessage,
  type Message,
  type RequestKind,
  type RequestMessage,
  type ResponseFor,
  type ResponseMessage,
  type StatusMessage,
} from './messages.js';
import { ReplayCache } from './replayCache.js';
import type { MeshTransport } from './transport.js';

export type RequestHandler = (msg: RequestMessage, source: string) => Promise<ResponseMessage>;
export type StatusHandler = (msg: StatusMessage, source: string) => void;

export interface EndpointOptions {
  transport: MeshTransport;
  mtu: number;
  retry: BackoffPolicy;
  reassemblyTimeoutMs: number;
  replayTtlMs: number;
  replayMaxEntries: number;
  /** Fragments one message may use (default 1024) */
  maxFragments?: number;
  /** Reassembly buffers held at once (default 256) */
  maxBuffers?: number;
  /** How often stale reassembly buffers and replay entries are dropped (default 60s) */
  sweepIntervalMs?: number;
  now?: () => number;
  random?: () => number;
  logger?: Logger;
}

interface PendingRequest {
  kind: RequestKind;
  destination: string;
  attempts: number;
  createdAt: number;
  /** Returns false when the message is not an answer to this request */
  deliver(msg: Message): boolean;
  fail(err: Error): void;
}

function isResponseTo<K extends RequestKind>(kind: K, msg: Message): msg is ResponseFor<K> {
  return msg.kind === RESPONSE_KIND[kind];
}

function pendingId(operatorId: string, requestId: string): string {
  return JSON.stringify([operatorId, requestId]);
}

export class ReliableEndpoint {
  private readonly transport: MeshTransport;
  private readonly opts: EndpointOptions;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly reassembler: Reassembler;
  private readonly replay: ReplayCache;
  private readonly pending = new Map<string, PendingRequest>();
  private readonly statusHandlers = new Set<StatusHandler>();
  private handler: RequestHandler | null = null;
  private readonly unsubscribe: () => void;
  private readonly sweepTimer: ReturnType<typeof setInterval>;
  private closed = false;

  constructor(opts: EndpointOptions) {
    this.opts = opts;
    this.transport = opts.transport;
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? Date.now;
    this.random = opts.random ?? Math.random;

    this.reassembler = new Reassembler({
      timeoutMs: opts.reassemblyTimeoutMs,
      maxFragments: opts.maxFragments ?? 1024,
      maxBuffers: opts.maxBuffers ?? 256,
      now: this.now,
      logger: this.logger,
    });
    this.replay = new ReplayCache({
      ttlMs: opts.replayTtlMs,
      maxEntries: opts.replayMaxEntries,
      now: this.now,
    });

    this.unsubscribe = this.transport.onReceive((source, bytes) => this.handlePacket(source, bytes));
    this.sweepTimer = setInterval(() => this.sweep(), opts.sweepIntervalMs ?? 60_000);
    this.sweepTimer.unref();
  }

  get address(): string {
    return this.transport.address;
  }

  /** Requests still waiting for an answer */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Send a request and wait for its answer, resending on silence.
   * Rejects with TIMEOUT once every attempt went unanswered.
   */
  request<M extends RequestMessage>(destination: string, msg: M): Promise<ResponseFor<M['kind']>> {
    const { operatorId, requestId } = msg;
    const id = pendingId(operatorId, requestId);
    if (this.closed) {
      return Promise.reject(new ProtocolError('TIMEOUT', 'Endpoint is closed', { operatorId, requestId }));
    }
    if (this.pending.has(id)) {
      return Promise.reject(new Error(`Request ${requestId} for ${operatorId} is already in flight`));
    }

    const frames = fragmentPayload({ operatorId, requestId, kind: msg.kind }, encodeMessage(msg), this.opts.mtu);
    const maxAttempts = this.opts.retry.maxAttempts;

    return new Promise<ResponseFor<M['kind']>>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = () => {
        clearTimeout(timer);
        this.pending.delete(id);
      };

      const entry: PendingRequest = {
        kind: msg.kind,
        destination,
        attempts: 0,
        createdAt: this.now(),
        deliver: (response) => {
          if (response.kind === 'error') {
            finish();
            reject(new ProtocolError(response.code, response.message, { operatorId, requestId }));
            return true;
          }
          if (!isResponseTo<M['kind']>(msg.kind, response)) {
            return false;
          }
          finish();
          resolve(response);
          return true;
        },
        fail: (err) => {
          finish();
          reject(err);
        },
      };

      const attempt = (n: number) => {
        if (!this.pending.has(id)) return;
        entry.attempts = n + 1;
        if (n > 0) {
          this.logger.info('request_resend', { operatorId, requestId, kind: msg.kind, attempt: n + 1 });
        }
        void this.sendFrames(destination, frames, { operatorId, requestId, kind: msg.kind });

        timer = setTimeout(() => {
          if (n + 1 < maxAttempts) {
            attempt(n + 1);
            return;
          }
          this.logger.warn('request_timeout', { operatorId, requestId, kind: msg.kind, attempts: n + 1 });
          entry.fail(
            new ProtocolError('TIMEOUT', `No answer to ${msg.kind} after ${n + 1} attempts`, {
              operatorId,
              requestId,
            }),
          );
        }, backoffDelay(this.opts.retry, n, this.random));
      };

      this.pending.set(id, entry);
      this.logger.debug('request_send', { operatorId, requestId, kind: msg.kind, frames: frames.length });
      attempt(0);
    });
  }

  /** Answer inbound requests with `handler`; replaces any previous handler. */
  serve(handler: RequestHandler): void {
    this.handler = handler;
  }

  /** Best-effort status notice; never resent, never acknowledged. */
  async push(destination: string, status: StatusMessage): Promise<void> {
    if (this.closed) return;
    const key: FragmentKey = { operatorId: status.operatorId, requestId: status.requestId, kind: status.kind };
    const frames = fragmentPayload(key, encodeMessage(status), this.opts.mtu);
    await this.sendFrames(destination, frames, key);
  }

  onStatus(handler: StatusHandler): () => void {
    this.statusHandlers.add(handler);
    return () => {
      this.statusHandlers.delete(handler);
    };
  }

  /** Drop expired reassembly buffers and replay entries. */
  sweep(): void {
    const buffers = this.reassembler.sweep();
    const replays = this.replay.sweep();
    if (buffers > 0 || replays > 0) {
      this.logger.debug('sweep', { buffers, replays });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    clearInterval(this.sweepTimer);
    this.unsubscribe();
    for (const entry of [...this.pending.values()]) {
      entry.fail(new ProtocolError('TIMEOUT', 'Endpoint closed before an answer arrived'));
    }
  }

  // ============================================
  // Inbound
  // ============================================

  private handlePacket(source: string, bytes: Uint8Array) {
    if (this.closed) return;

    let payload: Uint8Array | null;
    let key: FragmentKey;
    try {
      const fragment = decodeFragment(bytes);
      key = fragment;
      payload = this.reassembler.accept(source, fragment);
    } catch (err) {
      this.logger.warn('frame_dropped', { source, error: describeError(err) });
      return;
    }
    if (!payload) return;

    let msg: Message;
    try {
      msg = decodeMessage(payload);
    } catch (err) {
      if (isProtocolError(err) && err.code === 'UNKNOWN_KIND') {
        this.logger.debug('unknown_kind_skipped', { source, error: err.message });
      } else if (isProtocolError(err) && err.code === 'MALFORMED' && this.answersMalformed(key, err)) {
        this.logger.warn('malformed_request', { source, operatorId: key.operatorId, requestId: key.requestId, error: err.message });
        void this.reject(source, key, err);
      } else {
        this.logger.warn('message_dropped', { source, error: describeError(err) });
      }
      return;
    }

    if (msg.operatorId !== key.operatorId || msg.requestId !== key.requestId || msg.kind !== key.kind) {
      this.logger.warn('message_dropped', { source, error: 'Frame key does not match message' });
      return;
    }

    if (isRequest(msg)) {
      this.handleRequest(source, msg).catch((err) => {
        this.logger.error('request_handling_failed', {
          operatorId: msg.operatorId,
          requestId: msg.requestId,
          error: describeError(err),
        });
      });
      return;
    }

    if (msg.kind === 'status') {
      for (const handler of this.statusHandlers) {
        handler(msg, source);
      }
      return;
    }

    const entry = this.pending.get(pendingId(msg.operatorId, msg.requestId));
    if (!entry || !entry.deliver(msg)) {
      this.logger.debug('unmatched_response', { source, operatorId: msg.operatorId, requestId: msg.requestId, kind: msg.kind });
    }
  }

  private async handleRequest(source: string, msg: RequestMessage) {
    const handler = this.handler;
    if (!handler) {
      this.logger.warn('request_without_handler', { source, kind: msg.kind });
      return;
    }

    const { operatorId, requestId } = msg;
    const result = await this.replay.run({ operatorId, requestId, kind: msg.kind }, async () => {
      const response = await this.invoke(handler, msg, source);
      return {
        kind: response.kind,
        bytes: encodeMessage(response),
        cacheable: response.kind !== 'error' || !isTransientCode(response.code),
      };
    });

    if (result.replayed) {
      this.logger.info('replayed_response', { operatorId, requestId, kind: msg.kind });
    }

    const frames = fragmentPayload({ operatorId, requestId, kind: result.kind }, result.bytes, this.opts.mtu);
    await this.sendFrames(source, frames, { operatorId, requestId, kind: result.kind });
  }

  /**
   * A request whose fields fail validation is answered at once, but only
   * when the record names the same operator and request as its frames.
   */
  private answersMalformed(key: FragmentKey, err: ProtocolError): boolean {
    return (
      isRequestKind(key.kind) &&
      this.handler !== null &&
      err.operatorId === key.operatorId &&
      err.requestId === key.requestId
    );
  }

  /** Send an uncached error answer */
  private async reject(source: string, key: FragmentKey, err: ProtocolError) {
    const answer = errorResponse(key, err.code, err.message);
    const frameKey: FragmentKey = { operatorId: key.operatorId, requestId: key.requestId, kind: answer.kind };
    await this.sendFrames(source, fragmentPayload(frameKey, encodeMessage(answer), this.opts.mtu), frameKey);
  }

  private async invoke(handler: RequestHandler, msg: RequestMessage, source: string): Promise<ResponseMessage> {
    try {
      return await handler(msg, source);
    } catch (err) {
      if (isProtocolError(err)) {
        return errorResponse(msg, err.code, err.message);
      }
      this.logger.error('handler_threw', { operatorId: msg.operatorId, requestId: msg.requestId, error: describeError(err) });
      return errorResponse(msg, 'ENGINE_UNAVAILABLE', `Internal error: ${describeError(err)}`);
    }
  }

  private async sendFrames(destination: string, frames: Uint8Array[], key: FragmentKey) {
    try {
      for (const frame of frames) {
        await this.transport.send(destination, frame);
      }
    } catch (err) {
      this.logger.warn('send_failed', { destination, ...key, error: describeError(err) });
    }
  }
}

export function errorResponse(
  msg: Pick<RequestMessage, 'operatorId' | 'requestId'>,
  code: ErrorMessage['code'],
  message: string,
): ErrorMessage {
  return { kind: 'error', operatorId: msg.operatorId, requestId: msg.requestId, code, message };
}
