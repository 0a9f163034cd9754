/**
 * In-process mesh
 *
 * Stands in for the radio mesh in tests and local development. Packets are
 * delivered asynchronously and can be lost, duplicated or reordered; a packet
 * larger than the MTU is refused at the sender.
 */

import type { MeshTransport, ReceiveHandler } from './transport.js';

export interface MemoryMeshOptions {
  /** Largest packet accepted, in bytes */
  mtu?: number;
  /** Probability in [0, 1] that a packet is dropped */
  lossRate?: number;
  /** Probability in [0, 1] that a delivered packet arrives twice */
  duplicateRate?: number;
  /** Upper bound of a random per-packet delivery delay; 0 keeps send order */
  maxDelayMs?: number;
  random?: () => number;
}

export interface MeshPacket {
  from: string;
  to: string;
  bytes: Uint8Array;
}

/** Returns false to drop the packet */
export type PacketFilter = (packet: MeshPacket) => boolean;

export interface MeshStats {
  sent: number;
  delivered: number;
  dropped: number;
  duplicated: number;
}

export interface MemoryMesh {
  /** Attach a node under `address`; one transport per address */
  node(address: string): MeshTransport;
  setFilter(filter: PacketFilter | null): void;
  /** Every packet accepted by `send`, in send order */
  readonly log: readonly MeshPacket[];
  readonly stats: MeshStats;
  /** Resolves once no delivery is outstanding */
  idle(): Promise<void>;
}

export function createMemoryMesh(opts: MemoryMeshOptions = {}): MemoryMesh {
  const mtu = opts.mtu ?? Infinity;
  const lossRate = opts.lossRate ?? 0;
  const duplicateRate = opts.duplicateRate ?? 0;
  const maxDelayMs = opts.maxDelayMs ?? 0;
  const random = opts.random ?? Math.random;

  const handlers = new Map<string, Set<ReceiveHandler>>();
  const log: MeshPacket[] = [];
  const stats: MeshStats = { sent: 0, delivered: 0, dropped: 0, duplicated: 0 };
  let filter: PacketFilter | null = null;
  let inFlight = 0;
  let idleWaiters: Array<() => void> = [];

  function settleOne() {
    inFlight--;
    if (inFlight === 0) {
      const waiters = idleWaiters;
      idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  function deliver(packet: MeshPacket) {
    inFlight++;
    const delay = maxDelayMs > 0 ? Math.floor(random() * maxDelayMs) : 0;
    setTimeout(() => {
      const targets = handlers.get(packet.to);
      if (targets) {
        stats.delivered++;
        for (const handler of targets) {
          // each receiver gets its own copy, as a radio would
          handler(packet.from, packet.bytes.slice());
        }
      } else {
        stats.dropped++;
      }
      settleOne();
    }, delay);
  }

  function node(address: string): MeshTransport {
    if (handlers.has(address)) {
      throw new Error(`Mesh address already attached: ${address}`);
    }
    const own = new Set<ReceiveHandler>();
    handlers.set(address, own);

    return {
      address,

      async send(destination, bytes) {
        if (bytes.length > mtu) {
          throw new Error(`Packet of ${bytes.length} bytes exceeds mesh MTU ${mtu}`);
        }
        const packet: MeshPacket = { from: address, to: destination, bytes: bytes.slice() };
        log.push(packet);
        stats.sent++;

        if ((filter && !filter(packet)) || random() < lossRate) {
          stats.dropped++;
          return;
        }

        deliver(packet);
        if (duplicateRate > 0 && random() < duplicateRate) {
          stats.duplicated++;
          deliver(packet);
        }
      },

      onReceive(handler) {
        own.add(handler);
        return () => {
          own.delete(handler);
        };
      },

      async close() {
        own.clear();
        handlers.delete(address);
      },
    };
  }

  return {
    node,
    setFilter(next) {
      filter = next;
    },
    log,
    stats,
    idle() {
      if (inFlight === 0) return Promise.resolve();
      return new Promise((resolve) => idleWaiters.push(resolve));
    },
  };
}
