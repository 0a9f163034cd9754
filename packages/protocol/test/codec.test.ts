/**
 * Codec tests
 *
 * Encoding is a MessagePack record; decoding validates fields per kind and
 * only ever throws ProtocolError.
 */

import { describe, it, expect } from 'vitest';
import { encode } from '@msgpack/msgpack';
import {
  encodeMessage,
  decodeMessage,
  ProtocolError,
  PROTOCOL_MAGIC,
  PROTOCOL_VERSION,
  responseKindFor,
  isRequest,
  isResponse,
  type Message,
} from '../src/index.js';

const address = '4' + 'A'.repeat(94);
const viewKey = 'a'.repeat(64);

const samples: Message[] = [
  {
    kind: 'provision_wallet',
    operatorId: 'alice',
    requestId: 'prov-1',
    viewKey,
    walletAddress: address,
    restoreHeight: 3_100_000,
  },
  {
    kind: 'create_transaction',
    operatorId: 'alice',
    requestId: 'tx-1',
    destination: address,
    amount: '1.5',
    priority: 1,
  },
  {
    kind: 'history_response',
    operatorId: 'alice',
    requestId: 'hist-1',
    transfers: [
      {
        hash: 'c'.repeat(64),
        height: 3_100_042,
        timestamp: 1_700_000_000,
        amount: '0.25',
        fee: '0.00003',
        direction: 'in',
        confirmations: 12,
      },
    ],
  },
  {
    kind: 'status',
    operatorId: 'alice',
    requestId: 'push-1',
    event: 'tx_broadcast',
    txHash: 'd'.repeat(64),
    message: 'Transaction broadcast',
    timestamp: 1_700_000_100,
  },
];

function rawRecord(record: Record<string, unknown>): Uint8Array {
  return encode(record);
}

function decodeError(bytes: Uint8Array): ProtocolError {
  try {
    decodeMessage(bytes);
  } catch (err) {
    if (err instanceof ProtocolError) return err;
    throw err;
  }
  throw new Error('decodeMessage did not throw');
}

describe('encodeMessage / decodeMessage', () => {
  it.each(samples.map((m) => [m.kind, m] as const))('round-trips %s', (_kind, msg) => {
    expect(decodeMessage(encodeMessage(msg))).toEqual(msg);
  });

  it('leaves out optional fields that are undefined', () => {
    const withUndefined: Message = {
      kind: 'provision_wallet',
      operatorId: 'alice',
      requestId: 'prov-1',
      viewKey,
      walletAddress: address,
      restoreHeight: 3_100_000,
      walletName: undefined,
    };
    expect(encodeMessage(withUndefined)).toEqual(encodeMessage(samples[0]));
  });

  it('encodes the same message to the same bytes', () => {
    expect(encodeMessage(samples[1])).toEqual(encodeMessage({ ...samples[1] }));
  });
});

describe('decodeMessage failures', () => {
  it('rejects bytes that are not MessagePack', () => {
    expect(decodeError(new Uint8Array([0xc1])).code).toBe('MALFORMED');
  });

  it('rejects a record with the wrong magic', () => {
    const bytes = rawRecord({ m: 0x01, v: PROTOCOL_VERSION, k: 'balance_request', f: { operatorId: 'a', requestId: 'r' } });
    const err = decodeError(bytes);
    expect(err.code).toBe('MALFORMED');
    expect(err.message).toBe('Bad magic: 1');
  });

  it('rejects an unsupported version', () => {
    const bytes = rawRecord({ m: PROTOCOL_MAGIC, v: 9, k: 'balance_request', f: { operatorId: 'a', requestId: 'r' } });
    expect(decodeError(bytes).message).toBe('Unsupported protocol version: 9');
  });

  it('reports an unknown kind separately so callers can skip it', () => {
    const bytes = rawRecord({ m: PROTOCOL_MAGIC, v: PROTOCOL_VERSION, k: 'teleport', f: {} });
    const err = decodeError(bytes);
    expect(err.code).toBe('UNKNOWN_KIND');
    expect(err.message).toBe('Unknown message kind: teleport');
  });

  it('names the failing field and keeps the request id', () => {
    const bytes = rawRecord({
      m: PROTOCOL_MAGIC,
      v: PROTOCOL_VERSION,
      k: 'create_transaction',
      f: { operatorId: 'alice', requestId: 'tx-9', destination: address, amount: '1.5.0', priority: 1 },
    });
    const err = decodeError(bytes);
    expect(err.code).toBe('MALFORMED');
    expect(err.requestId).toBe('tx-9');
    expect(err.operatorId).toBe('alice');
    expect(err.message).toBe('Malformed create_transaction: amount: Must be an XMR amount with at most 12 decimals');
  });

  it('rejects a priority outside 0-3', () => {
    const bytes = rawRecord({
      m: PROTOCOL_MAGIC,
      v: PROTOCOL_VERSION,
      k: 'create_transaction',
      f: { operatorId: 'alice', requestId: 'tx-9', destination: address, amount: '1', priority: 4 },
    });
    expect(decodeError(bytes).code).toBe('MALFORMED');
  });

  it('rejects fields that are not a map', () => {
    const bytes = rawRecord({ m: PROTOCOL_MAGIC, v: PROTOCOL_VERSION, k: 'balance_request', f: [1, 2] });
    expect(decodeError(bytes).message).toBe('Fields of balance_request must be a map');
  });
});

describe('catalog pairing', () => {
  it('maps each request to its response kind', () => {
    expect(responseKindFor('provision_wallet')).toBe('provision_ack');
    expect(responseKindFor('signed_transaction')).toBe('transaction_result');
    expect(responseKindFor('import_key_images')).toBe('key_images_applied');
  });

  it('classifies requests, responses and status', () => {
    expect(isRequest(samples[1])).toBe(true);
    expect(isResponse(samples[2])).toBe(true);
    expect(isRequest(samples[3])).toBe(false);
    expect(isResponse(samples[3])).toBe(false);
  });
});
