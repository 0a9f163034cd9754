/**
 * Mesh Bridge
 *
 * Packet switch between nodes attached over WebSocket. A node attaches
 * under one mesh address and sends packets addressed to another; the bridge
 * forwards each to the node attached under that address, if any. Like the
 * radio it stands in for, it promises nothing: packets to unknown
 * addresses are dropped and loss or duplication can be switched on.
 */

import { silentLogger, type Logger } from '@coldmesh/protocol';
import {
  decodePacket,
  isFrameTooLarge,
  parseClientFrame,
  type AttachedFrame,
  type BridgeErrorCode,
  type BridgeErrorFrame,
  type DeliverFrame,
  type SendFrame,
} from './frames.js';

/** One connected node, whatever carries it */
export interface BridgePeer {
  readonly id: string;
  send(text: string): void;
}

export interface MeshBridgeOptions {
  /** Largest packet forwarded, in bytes (default 465) */
  mtu?: number;
  /** Probability in [0, 1] that a packet is dropped */
  lossRate?: number;
  /** Probability in [0, 1] that a forwarded packet is sent twice */
  duplicateRate?: number;
  random?: () => number;
  logger?: Logger;
}

export interface BridgeStats {
  forwarded: number;
  dropped: number;
  duplicated: number;
  unreachable: number;
}

export class MeshBridge {
  private readonly byAddress = new Map<string, BridgePeer>();
  private readonly addresses = new Map<BridgePeer, string>();
  private readonly mtu: number;
  private readonly lossRate: number;
  private readonly duplicateRate: number;
  private readonly random: () => number;
  private readonly logger: Logger;
  readonly stats: BridgeStats = { forwarded: 0, dropped: 0, duplicated: 0, unreachable: 0 };

  constructor(opts: MeshBridgeOptions = {}) {
    this.mtu = opts.mtu ?? 465;
    this.lossRate = opts.lossRate ?? 0;
    this.duplicateRate = opts.duplicateRate ?? 0;
    this.random = opts.random ?? Math.random;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Attached nodes */
  get size(): number {
    return this.byAddress.size;
  }

  addressOf(peer: BridgePeer): string | undefined {
    return this.addresses.get(peer);
  }

  handleFrame(peer: BridgePeer, raw: string): void {
    if (isFrameTooLarge(raw)) {
      this.sendError(peer, 'TOO_LARGE', 'Frame exceeds 64KB limit');
      return;
    }

    const frame = parseClientFrame(raw);
    if (!frame) {
      this.sendError(peer, 'BAD_FRAME', 'Invalid frame format');
      return;
    }

    if (frame.type === 'attach') {
      this.attach(peer, frame.address);
    } else {
      this.forward(peer, frame);
    }
  }

  detach(peer: BridgePeer): void {
    const address = this.addresses.get(peer);
    this.addresses.delete(peer);
    // A newer connection may hold the address by now
    if (address !== undefined && this.byAddress.get(address) === peer) {
      this.byAddress.delete(address);
    }
    this.logger.info('detach', { peer: peer.id, address });
  }

  private attach(peer: BridgePeer, address: string) {
    const previousAddress = this.addresses.get(peer);
    if (previousAddress !== undefined && this.byAddress.get(previousAddress) === peer) {
      this.byAddress.delete(previousAddress);
    }

    const holder = this.byAddress.get(address);
    if (holder && holder !== peer) {
      this.addresses.delete(holder);
      this.sendError(holder, 'REPLACED', `Address ${address} was attached by another connection`);
    }

    this.byAddress.set(address, peer);
    this.addresses.set(peer, address);

    const ack: AttachedFrame = { type: 'attached', address, peers: this.byAddress.size };
    peer.send(JSON.stringify(ack));
    this.logger.info('attach', { peer: peer.id, address, peers: this.byAddress.size });
  }

  private forward(peer: BridgePeer, frame: SendFrame) {
    const from = this.addresses.get(peer);
    if (from === undefined) {
      this.sendError(peer, 'NOT_ATTACHED', 'Attach to an address before sending packets');
      return;
    }

    const size = decodePacket(frame.data).length;
    if (size > this.mtu) {
      this.sendError(peer, 'TOO_LARGE', `Packet of ${size} bytes exceeds the mesh MTU of ${this.mtu}`);
      return;
    }

    const target = this.byAddress.get(frame.to);
    if (!target) {
      this.stats.unreachable++;
      this.logger.debug('unreachable', { from, to: frame.to });
      return;
    }

    if (this.random() < this.lossRate) {
      this.stats.dropped++;
      this.logger.debug('dropped', { from, to: frame.to });
      return;
    }

    const deliver: DeliverFrame = { type: 'packet', from, data: frame.data };
    const text = JSON.stringify(deliver);
    target.send(text);
    this.stats.forwarded++;

    if (this.random() < this.duplicateRate) {
      target.send(text);
      this.stats.duplicated++;
    }

    this.logger.debug('forward', { from, to: frame.to, bytes: size });
  }

  private sendError(peer: BridgePeer, code: BridgeErrorCode, message: string) {
    const error: BridgeErrorFrame = { type: 'error', code, message };
    peer.send(JSON.stringify(error));
    this.logger.warn('error', { peer: peer.id, code, message });
  }
}
