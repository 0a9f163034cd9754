/**
 * Fragmentation and reassembly tests
 */

import { describe, it, expect } from 'vitest';
import {
  decodeFragment,
  encodeFragment,
  fragmentOverhead,
  fragmentPayload,
  ProtocolError,
  Reassembler,
  type FragmentKey,
} from '../src/index.js';

const key: FragmentKey = { operatorId: 'alice', requestId: 'tx-1', kind: 'signed_transaction' };

function filled(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (i * 31 + 7) % 256);
}

function reassembler(now: () => number = () => 0, overrides: { maxFragments?: number; maxBuffers?: number } = {}) {
  return new Reassembler({
    timeoutMs: 1000,
    maxFragments: overrides.maxFragments ?? 1024,
    maxBuffers: overrides.maxBuffers ?? 16,
    now,
  });
}

describe('fragmentPayload', () => {
  it('sends a small payload as one final frame', () => {
    const frames = fragmentPayload(key, filled(40), 465);
    expect(frames).toHaveLength(1);

    const fragment = decodeFragment(frames[0]);
    expect(fragment).toMatchObject({ ...key, index: 0, final: true });
    expect(fragment.chunk).toEqual(filled(40));
  });

  it('keeps every frame within the MTU', () => {
    const payload = filled(13_000);
    const frames = fragmentPayload(key, payload, 465);
    const chunkSize = 465 - fragmentOverhead(key);

    expect(frames).toHaveLength(Math.ceil(13_000 / chunkSize));
    for (const frame of frames) {
      expect(frame.length).toBeLessThanOrEqual(465);
    }

    const decoded = frames.map(decodeFragment);
    expect(decoded.map((f) => f.index)).toEqual(decoded.map((_, i) => i));
    expect(decoded.filter((f) => f.final).map((f) => f.index)).toEqual([frames.length - 1]);
  });

  it('refuses an MTU that leaves no room for payload', () => {
    expect(() => fragmentPayload(key, filled(10), 20)).toThrow(/MTU 20 leaves no room/);
  });
});

describe('decodeFragment', () => {
  it('rejects bytes that are not a frame', () => {
    expect(() => decodeFragment(new Uint8Array([0x93, 1, 2, 3]))).toThrow(ProtocolError);
  });

  it('rejects a negative index', () => {
    const bytes = encodeFragment({ ...key, index: -1, final: true, chunk: new Uint8Array(1) });
    expect(() => decodeFragment(bytes)).toThrow('Frame index out of range');
  });
});

describe('Reassembler', () => {
  it('rebuilds the payload from reordered and duplicated fragments', () => {
    const payload = filled(5000);
    const frames = fragmentPayload(key, payload, 465).map(decodeFragment);
    const r = reassembler();

    const reversed = [...frames].reverse();
    // every fragment twice except index 0, which completes the message
    const results: Uint8Array[] = [];
    for (const fragment of reversed.slice(0, -1)) {
      for (const copy of [fragment, fragment]) {
        const out = r.accept('relay', copy);
        if (out) results.push(out);
      }
    }
    expect(results).toHaveLength(0);

    const out = r.accept('relay', reversed[reversed.length - 1]);
    expect(out).toEqual(payload);
    expect(r.size).toBe(0);
  });

  it('keeps buffers of different sources apart', () => {
    const [first, second] = fragmentPayload(key, filled(600), 465).map(decodeFragment);
    const r = reassembler();

    expect(r.accept('node-a', first)).toBeNull();
    expect(r.accept('node-b', second)).toBeNull();
    expect(r.size).toBe(2);
  });

  it('drops incomplete buffers after the timeout', () => {
    let now = 0;
    const [first] = fragmentPayload(key, filled(600), 465).map(decodeFragment);
    const r = reassembler(() => now);

    r.accept('relay', first);
    now = 1000;
    expect(r.sweep()).toBe(0);
    now = 1001;
    expect(r.sweep()).toBe(1);
    expect(r.size).toBe(0);
  });

  it('starts over when a fragment arrives for a timed-out buffer', () => {
    let now = 0;
    const [first, second] = fragmentPayload(key, filled(600), 465).map(decodeFragment);
    const r = reassembler(() => now);

    r.accept('relay', first);
    now = 5000;
    expect(r.accept('relay', second)).toBeNull();
    expect(r.accept('relay', first)).toEqual(filled(600));
  });

  it('evicts the oldest buffer beyond maxBuffers', () => {
    const r = reassembler(() => 0, { maxBuffers: 2 });
    for (const requestId of ['r-1', 'r-2', 'r-3']) {
      const [first] = fragmentPayload({ ...key, requestId }, filled(600), 465).map(decodeFragment);
      r.accept('relay', first);
    }
    expect(r.size).toBe(2);

    const [, lastOfFirst] = fragmentPayload({ ...key, requestId: 'r-1' }, filled(600), 465).map(decodeFragment);
    expect(r.accept('relay', lastOfFirst)).toBeNull();
  });

  it('ignores fragments past maxFragments', () => {
    const r = reassembler(() => 0, { maxFragments: 2 });
    const out = r.accept('relay', { ...key, index: 2, final: true, chunk: new Uint8Array(1) });
    expect(out).toBeNull();
    expect(r.size).toBe(0);
  });

  it('ignores a second final fragment with a different index', () => {
    const r = reassembler();
    r.accept('relay', { ...key, index: 1, final: true, chunk: new Uint8Array([2]) });
    expect(r.accept('relay', { ...key, index: 2, final: true, chunk: new Uint8Array([3]) })).toBeNull();
    expect(r.accept('relay', { ...key, index: 0, final: false, chunk: new Uint8Array([1]) })).toEqual(
      new Uint8Array([1, 2]),
    );
  });
});
