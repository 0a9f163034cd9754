/**
 * Fragmentation and Reassembly
 *
 * Every transport packet is one fragment frame, a MessagePack array:
 *
 *   [magic, frameType, operatorId, requestId, kind, index, final, chunk]
 *
 * An encoded message that fits the MTU travels as a single frame with
 * `final = true`. Larger ones are cut into numbered chunks; the receiver
 * collects them per (source, operatorId, requestId, kind) and emits the
 * original bytes once the final fragment and every index below it are in.
 */

import { encode, decode } from '@msgpack/msgpack';
import { PROTOCOL_MAGIC } from './codec.js';
import { ProtocolError } from './errors.js';
import { silentLogger, type Logger } from './log.js';

export const FRAME_FRAGMENT = 1;
export const MAX_FRAGMENT_INDEX = 0xffff;

export interface FragmentKey {
  operatorId: string;
  requestId: string;
  kind: string;
}

export interface Fragment extends FragmentKey {
  index: number;
  final: boolean;
  chunk: Uint8Array;
}

export function encodeFragment(fragment: Fragment): Uint8Array {
  return encode([
    PROTOCOL_MAGIC,
    FRAME_FRAGMENT,
    fragment.operatorId,
    fragment.requestId,
    fragment.kind,
    fragment.index,
    fragment.final,
    fragment.chunk,
  ]);
}

export function decodeFragment(bytes: Uint8Array): Fragment {
  let raw: unknown;
  try {
    raw = decode(bytes);
  } catch (err) {
    throw new ProtocolError('MALFORMED', `Frame is not MessagePack: ${err}`);
  }

  if (!Array.isArray(raw) || raw.length !== 8) {
    throw new ProtocolError('MALFORMED', 'Frame must be an 8-element array');
  }

  const [magic, frameType, operatorId, requestId, kind, index, final, chunk] = raw;
  if (magic !== PROTOCOL_MAGIC || frameType !== FRAME_FRAGMENT) {
    throw new ProtocolError('MALFORMED', 'Unknown frame type');
  }
  if (typeof operatorId !== 'string' || typeof requestId !== 'string' || typeof kind !== 'string') {
    throw new ProtocolError('MALFORMED', 'Frame key fields must be strings');
  }
  if (typeof index !== 'number' || !Number.isInteger(index) || index < 0 || index > MAX_FRAGMENT_INDEX) {
    throw new ProtocolError('MALFORMED', 'Frame index out of range', { operatorId, requestId });
  }
  if (typeof final !== 'boolean' || !(chunk instanceof Uint8Array)) {
    throw new ProtocolError('MALFORMED', 'Frame flag or chunk has the wrong type', { operatorId, requestId });
  }

  return { operatorId, requestId, kind, index, final, chunk };
}

/**
 * Upper bound on the bytes a frame adds around its chunk for this key.
 * Measured with the widest index encoding and a 16-bit binary length header.
 */
export function fragmentOverhead(key: FragmentKey): number {
  const empty = encodeFragment({ ...key, index: MAX_FRAGMENT_INDEX, final: false, chunk: new Uint8Array(0) });
  // an empty chunk carries a 2-byte bin8 header; chunks up to 64 KiB need 3
  return empty.length + 1;
}

/**
 * Split an encoded message into frames no larger than `mtu` bytes each.
 */
export function fragmentPayload(key: FragmentKey, payload: Uint8Array, mtu: number): Uint8Array[] {
  const chunkSize = Math.min(mtu - fragmentOverhead(key), 0xffff);
  if (chunkSize < 1) {
    throw new Error(`MTU ${mtu} leaves no room for payload (frame overhead ${fragmentOverhead(key)} bytes)`);
  }

  const count = Math.max(1, Math.ceil(payload.length / chunkSize));
  if (count > MAX_FRAGMENT_INDEX + 1) {
    throw new Error(`Payload of ${payload.length} bytes needs ${count} fragments at MTU ${mtu}`);
  }

  const frames: Uint8Array[] = [];
  for (let index = 0; index < count; index++) {
    const chunk = payload.subarray(index * chunkSize, (index + 1) * chunkSize);
    frames.push(encodeFragment({ ...key, index, final: index === count - 1, chunk }));
  }
  return frames;
}

// ============================================
// Reassembly
// ============================================

interface ReassemblyBuffer {
  slots: Map<number, Uint8Array>;
  finalIndex: number | null;
  firstSeen: number;
}

export interface ReassemblerOptions {
  /** Incomplete buffers older than this are discarded */
  timeoutMs: number;
  /** Highest number of fragments one message may use */
  maxFragments: number;
  /** Open buffers kept at once; the oldest is evicted beyond this */
  maxBuffers: number;
  now?: () => number;
  logger?: Logger;
}

export class Reassembler {
  private buffers = new Map<string, ReassemblyBuffer>();
  private readonly opts: ReassemblerOptions;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(opts: ReassemblerOptions) {
    this.opts = opts;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Number of incomplete buffers currently held */
  get size(): number {
    return this.buffers.size;
  }

  /**
   * Take one fragment. Returns the complete payload when this fragment
   * finishes a message, otherwise null.
   */
  accept(source: string, fragment: Fragment): Uint8Array | null {
    const { index, final } = fragment;
    const details = { source, operatorId: fragment.operatorId, requestId: fragment.requestId, index };

    if (index >= this.opts.maxFragments) {
      this.logger.warn('fragment_index_too_large', details);
      return null;
    }

    const key = JSON.stringify([source, fragment.operatorId, fragment.requestId, fragment.kind]);
    let buffer = this.buffers.get(key);

    if (buffer && this.now() - buffer.firstSeen > this.opts.timeoutMs) {
      this.buffers.delete(key);
      buffer = undefined;
    }

    if (!buffer) {
      if (this.buffers.size >= this.opts.maxBuffers) {
        this.evictOldest();
      }
      buffer = { slots: new Map(), finalIndex: null, firstSeen: this.now() };
      this.buffers.set(key, buffer);
    }

    if (buffer.finalIndex !== null) {
      if (final && index !== buffer.finalIndex) {
        this.logger.warn('fragment_conflicting_final', details);
        return null;
      }
      if (!final && index >= buffer.finalIndex) {
        this.logger.warn('fragment_beyond_final', details);
        return null;
      }
    } else if (final) {
      for (const seen of buffer.slots.keys()) {
        if (seen > index) {
          this.logger.warn('fragment_conflicting_final', details);
          return null;
        }
      }
      buffer.finalIndex = index;
    }

    buffer.slots.set(index, fragment.chunk);

    if (buffer.finalIndex === null || buffer.slots.size !== buffer.finalIndex + 1) {
      return null;
    }

    this.buffers.delete(key);
    return concatSlots(buffer.slots, buffer.finalIndex);
  }

  /** Drop every buffer older than the timeout; returns how many were dropped. */
  sweep(): number {
    const cutoff = this.now() - this.opts.timeoutMs;
    let dropped = 0;
    for (const [key, buffer] of this.buffers) {
      if (buffer.firstSeen < cutoff) {
        this.buffers.delete(key);
        dropped++;
      }
    }
    if (dropped > 0) {
      this.logger.debug('reassembly_swept', { dropped });
    }
    return dropped;
  }

  private evictOldest() {
    const oldest = this.buffers.keys().next();
    if (!oldest.done) {
      this.buffers.delete(oldest.value);
      this.logger.warn('reassembly_evicted', { remaining: this.buffers.size });
    }
  }
}

function concatSlots(slots: Map<number, Uint8Array>, finalIndex: number): Uint8Array {
  let length = 0;
  for (const chunk of slots.values()) length += chunk.length;

  const out = new Uint8Array(length);
  let offset = 0;
  for (let i = 0; i <= finalIndex; i++) {
    const chunk = slots.get(i);
    if (!chunk) {
      throw new Error(`Reassembly slot ${i} missing`);
    }
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
