/**
 * Mesh bridge switching tests with in-memory peers
 */

import { describe, it, expect } from 'vitest';
import { MeshBridge, type BridgePeer } from '../src/bridge.js';

interface FakePeer extends BridgePeer {
  sent: string[];
  frames(): unknown[];
}

function fakePeer(id: string): FakePeer {
  const sent: string[] = [];
  return {
    id,
    sent,
    send: (text) => {
      sent.push(text);
    },
    frames: () => sent.map((text) => JSON.parse(text)),
  };
}

function attach(bridge: MeshBridge, peer: BridgePeer, address: string) {
  bridge.handleFrame(peer, JSON.stringify({ type: 'attach', address }));
}

describe('MeshBridge', () => {
  it('acknowledges an attach with the number of attached nodes', () => {
    const bridge = new MeshBridge();
    const relay = fakePeer('p1');
    const op = fakePeer('p2');

    attach(bridge, relay, 'relay');
    attach(bridge, op, 'op-1');

    expect(relay.frames()).toEqual([{ type: 'attached', address: 'relay', peers: 1 }]);
    expect(op.frames()).toEqual([{ type: 'attached', address: 'op-1', peers: 2 }]);
    expect(bridge.size).toBe(2);
  });

  it('forwards a packet to the node attached under the destination', () => {
    const bridge = new MeshBridge();
    const relay = fakePeer('p1');
    const op = fakePeer('p2');
    attach(bridge, relay, 'relay');
    attach(bridge, op, 'op-1');

    bridge.handleFrame(relay, JSON.stringify({ type: 'packet', to: 'op-1', data: 'AQID' }));

    expect(op.frames()[1]).toEqual({ type: 'packet', from: 'relay', data: 'AQID' });
    expect(relay.sent).toHaveLength(1);
    expect(bridge.stats.forwarded).toBe(1);
  });

  it('refuses packets from a node that has not attached', () => {
    const bridge = new MeshBridge();
    const stranger = fakePeer('p1');

    bridge.handleFrame(stranger, JSON.stringify({ type: 'packet', to: 'relay', data: 'AQID' }));

    expect(stranger.frames()).toEqual([
      { type: 'error', code: 'NOT_ATTACHED', message: 'Attach to an address before sending packets' },
    ]);
  });

  it('refuses malformed frames and invalid addresses', () => {
    const bridge = new MeshBridge();
    const peer = fakePeer('p1');

    bridge.handleFrame(peer, 'not json');
    bridge.handleFrame(peer, JSON.stringify({ type: 'attach', address: 'bad address!' }));
    bridge.handleFrame(peer, JSON.stringify({ type: 'packet', to: 'relay' }));

    expect(peer.frames()).toEqual([
      { type: 'error', code: 'BAD_FRAME', message: 'Invalid frame format' },
      { type: 'error', code: 'BAD_FRAME', message: 'Invalid frame format' },
      { type: 'error', code: 'BAD_FRAME', message: 'Invalid frame format' },
    ]);
    expect(bridge.size).toBe(0);
  });

  it('refuses packets larger than the mesh MTU', () => {
    const bridge = new MeshBridge({ mtu: 32 });
    const relay = fakePeer('p1');
    const op = fakePeer('p2');
    attach(bridge, relay, 'relay');
    attach(bridge, op, 'op-1');

    const data = Buffer.alloc(33).toString('base64');
    bridge.handleFrame(relay, JSON.stringify({ type: 'packet', to: 'op-1', data }));

    expect(relay.frames()[1]).toEqual({
      type: 'error',
      code: 'TOO_LARGE',
      message: 'Packet of 33 bytes exceeds the mesh MTU of 32',
    });
    expect(op.sent).toHaveLength(1);
  });

  it('drops packets to addresses nobody holds', () => {
    const bridge = new MeshBridge();
    const relay = fakePeer('p1');
    attach(bridge, relay, 'relay');

    bridge.handleFrame(relay, JSON.stringify({ type: 'packet', to: 'op-9', data: 'AQID' }));

    expect(relay.sent).toHaveLength(1);
    expect(bridge.stats.unreachable).toBe(1);
  });

  it('hands an address over to the newest connection', () => {
    const bridge = new MeshBridge();
    const relay = fakePeer('p1');
    const oldOp = fakePeer('p2');
    const newOp = fakePeer('p3');
    attach(bridge, relay, 'relay');
    attach(bridge, oldOp, 'op-1');
    attach(bridge, newOp, 'op-1');

    expect(oldOp.frames()[1]).toEqual({
      type: 'error',
      code: 'REPLACED',
      message: 'Address op-1 was attached by another connection',
    });
    expect(newOp.frames()[0]).toEqual({ type: 'attached', address: 'op-1', peers: 2 });

    // The stale socket closing must not detach the new holder
    bridge.detach(oldOp);
    bridge.handleFrame(relay, JSON.stringify({ type: 'packet', to: 'op-1', data: 'AQID' }));

    expect(bridge.addressOf(newOp)).toBe('op-1');
    expect(newOp.frames()[1]).toEqual({ type: 'packet', from: 'relay', data: 'AQID' });
    expect(oldOp.sent).toHaveLength(2);
  });

  it('detaches a closed node', () => {
    const bridge = new MeshBridge();
    const relay = fakePeer('p1');
    const op = fakePeer('p2');
    attach(bridge, relay, 'relay');
    attach(bridge, op, 'op-1');

    bridge.detach(op);
    bridge.handleFrame(relay, JSON.stringify({ type: 'packet', to: 'op-1', data: 'AQID' }));

    expect(bridge.size).toBe(1);
    expect(bridge.stats.unreachable).toBe(1);
  });

  it('applies configured loss and duplication', () => {
    const draws = [0.9, 0.1, 0.1];
    const bridge = new MeshBridge({ lossRate: 0.5, duplicateRate: 0.5, random: () => draws.shift() ?? 0.99 });
    const relay = fakePeer('p1');
    const op = fakePeer('p2');
    attach(bridge, relay, 'relay');
    attach(bridge, op, 'op-1');

    const packet = JSON.stringify({ type: 'packet', to: 'op-1', data: 'AQID' });
    bridge.handleFrame(relay, packet);
    bridge.handleFrame(relay, packet);

    expect(op.sent).toHaveLength(3);
    expect(bridge.stats).toEqual({ forwarded: 1, dropped: 1, duplicated: 1, unreachable: 0 });
  });
});
