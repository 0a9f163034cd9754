/**
 * WebSocket Mesh Transport
 *
 * Attaches a node to the mesh bridge under its address and carries packets
 * both ways. A dropped connection is re-established with backoff; packets
 * sent while detached fail, and the reliable endpoint resends them later.
 */

import WebSocket from 'ws';
import {
  backoffDelay,
  describeError,
  silentLogger,
  type BackoffPolicy,
  type Logger,
  type MeshTransport,
  type ReceiveHandler,
} from '@coldmesh/protocol';
import { decodePacket, encodePacket, parseServerFrame, type AttachFrame, type SendFrame } from './frames.js';

export interface SocketHandlers {
  onOpen: () => void;
  onMessage: (text: string) => void;
  onError: (error: Error) => void;
  onClose: () => void;
}

export interface SocketHandle {
  send(text: string): void;
  close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketHandle;

export const openWebSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(data.toString()));
  ws.on('error', (err) => handlers.onError(err));
  ws.on('close', () => handlers.onClose());
  return {
    send: (text) => {
      if (ws.readyState !== WebSocket.OPEN) {
        throw new Error('WebSocket is not open');
      }
      ws.send(text);
    },
    close: () => ws.close(),
  };
};

export const DEFAULT_RECONNECT: BackoffPolicy = {
  baseDelayMs: 1_000,
  factor: 2,
  jitterRatio: 0.2,
  maxDelayMs: 30_000,
  maxAttempts: 1_000,
};

export interface WsMeshTransportOptions {
  url: string;
  address: string;
  reconnect?: BackoffPolicy;
  random?: () => number;
  logger?: Logger;
  socketFactory?: SocketFactory;
}

export class WsMeshTransport implements MeshTransport {
  readonly address: string;
  private readonly url: string;
  private readonly reconnect: BackoffPolicy;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly socketFactory: SocketFactory;
  private readonly handlers = new Set<ReceiveHandler>();
  private readonly waiters = new Set<{ resolve: () => void; reject: (err: Error) => void }>();
  private socket: SocketHandle | null = null;
  private attached = false;
  private closed = false;
  private failures = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(opts: WsMeshTransportOptions) {
    this.url = opts.url;
    this.address = opts.address;
    this.reconnect = opts.reconnect ?? DEFAULT_RECONNECT;
    this.random = opts.random ?? Math.random;
    this.logger = opts.logger ?? silentLogger;
    this.socketFactory = opts.socketFactory ?? openWebSocket;
    this.connect();
  }

  get isAttached(): boolean {
    return this.attached;
  }

  /** Resolves once attached to the bridge; rejects after `timeoutMs` */
  ready(timeoutMs = 10_000): Promise<void> {
    if (this.attached) return Promise.resolve();
    if (this.closed) return Promise.reject(new Error('Transport is closed'));

    return new Promise<void>((resolve, reject) => {
      const waiter = {
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (err: Error) => {
          clearTimeout(timer);
          reject(err);
        },
      };
      const timer = setTimeout(() => {
        this.waiters.delete(waiter);
        reject(new Error(`Could not attach to mesh bridge ${this.url} within ${timeoutMs}ms`));
      }, timeoutMs);
      this.waiters.add(waiter);
    });
  }

  async send(destination: string, bytes: Uint8Array): Promise<void> {
    if (!this.socket || !this.attached) {
      throw new Error(`Not attached to mesh bridge ${this.url}`);
    }
    const frame: SendFrame = { type: 'packet', to: destination, data: encodePacket(bytes) };
    this.socket.send(JSON.stringify(frame));
  }

  onReceive(handler: ReceiveHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.attached = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.socket?.close();
    this.socket = null;
    this.rejectWaiters(new Error('Transport is closed'));
  }

  private connect() {
    this.logger.debug('bridge_connect', { url: this.url, attempt: this.failures + 1 });
    let socket: SocketHandle | null = null;
    const live = () => socket !== null && socket === this.socket;
    socket = this.socketFactory(this.url, {
      onOpen: () => {
        if (!socket || !live()) return;
        const attach: AttachFrame = { type: 'attach', address: this.address };
        socket.send(JSON.stringify(attach));
      },
      onMessage: (text) => {
        if (live()) this.handleMessage(text);
      },
      onError: (err) => {
        this.logger.warn('bridge_error', { url: this.url, error: describeError(err) });
      },
      onClose: () => {
        if (live()) this.handleClose();
      },
    });
    this.socket = socket;
  }

  private handleMessage(text: string) {
    const frame = parseServerFrame(text);
    if (!frame) {
      this.logger.warn('bridge_frame_invalid', { url: this.url });
      return;
    }

    switch (frame.type) {
      case 'attached':
        this.attached = true;
        this.failures = 0;
        this.logger.info('bridge_attached', { url: this.url, address: frame.address, peers: frame.peers });
        for (const waiter of [...this.waiters]) {
          this.waiters.delete(waiter);
          waiter.resolve();
        }
        break;

      case 'packet': {
        const bytes = decodePacket(frame.data);
        for (const handler of this.handlers) {
          handler(frame.from, bytes);
        }
        break;
      }

      case 'error':
        if (frame.code === 'REPLACED') {
          this.attached = false;
        }
        this.logger.warn('bridge_refused', { code: frame.code, message: frame.message });
        break;
    }
  }

  private handleClose() {
    this.socket = null;
    this.attached = false;
    if (this.closed) return;

    if (this.failures >= this.reconnect.maxAttempts) {
      this.logger.error('bridge_unreachable', { url: this.url, attempts: this.failures });
      this.rejectWaiters(new Error(`Mesh bridge ${this.url} unreachable after ${this.failures} attempts`));
      return;
    }

    const delay = backoffDelay(this.reconnect, this.failures, this.random);
    this.failures++;
    this.logger.info('bridge_reconnect', { url: this.url, inMs: delay });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.closed) this.connect();
    }, delay);
    this.reconnectTimer.unref();
  }

  private rejectWaiters(err: Error) {
    for (const waiter of [...this.waiters]) {
      this.waiters.delete(waiter);
      waiter.reject(err);
    }
  }
}
