/**
 * Binary Message Codec
 *
 * A message is one MessagePack record `{ m, v, k, f }`: magic byte, protocol
 * version, kind tag and the named fields. Decoding validates the fields
 * against the kind's schema, so a caller either gets a well-typed Message or
 * a ProtocolError (MALFORMED, or UNKNOWN_KIND for a kind this build does not
 * know, which callers may skip).
 */

import { encode, decode } from '@msgpack/msgpack';
import { ProtocolError } from './errors.js';
import { isKnownKind, MessageSchema, type Message } from './messages.js';

export const PROTOCOL_MAGIC = 0xcd;
export const PROTOCOL_VERSION = 1;

interface WireRecord {
  m: number;
  v: number;
  k: string;
  f: Record<string, unknown>;
}

/**
 * Encode a message as a MessagePack record.
 * Optional fields that are undefined are left out.
 */
export function encodeMessage(msg: Message): Uint8Array {
  const { kind, ...fields } = msg;
  const record: WireRecord = {
    m: PROTOCOL_MAGIC,
    v: PROTOCOL_VERSION,
    k: kind,
    f: fields,
  };
  return encode(record, { ignoreUndefined: true });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

function readRecord(bytes: Uint8Array): WireRecord {
  let raw: unknown;
  try {
    raw = decode(bytes);
  } catch (err) {
    throw new ProtocolError('MALFORMED', `Not a MessagePack record: ${err}`);
  }

  if (!isPlainObject(raw)) {
    throw new ProtocolError('MALFORMED', 'Record must be a map');
  }

  const { m, v, k, f } = raw;
  if (m !== PROTOCOL_MAGIC) {
    throw new ProtocolError('MALFORMED', `Bad magic: ${String(m)}`);
  }
  if (v !== PROTOCOL_VERSION) {
    throw new ProtocolError('MALFORMED', `Unsupported protocol version: ${String(v)}`);
  }
  if (typeof k !== 'string') {
    throw new ProtocolError('MALFORMED', 'Missing kind tag');
  }
  if (!isPlainObject(f)) {
    throw new ProtocolError('MALFORMED', `Fields of ${k} must be a map`);
  }

  return { m: PROTOCOL_MAGIC, v: PROTOCOL_VERSION, k, f };
}

export function decodeMessage(bytes: Uint8Array): Message {
  const record = readRecord(bytes);

  if (!isKnownKind(record.k)) {
    throw new ProtocolError('UNKNOWN_KIND', `Unknown message kind: ${record.k}`);
  }

  const parsed = MessageSchema.safeParse({ ...record.f, kind: record.k });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid fields';
    const requestId = typeof record.f.requestId === 'string' ? record.f.requestId : undefined;
    const operatorId = typeof record.f.operatorId === 'string' ? record.f.operatorId : undefined;
    throw new ProtocolError('MALFORMED', `Malformed ${record.k}: ${where}`, { requestId, operatorId });
  }

  return parsed.data;
}
