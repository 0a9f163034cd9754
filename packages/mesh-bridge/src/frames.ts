/**
 * Bridge Wire Frames
 *
 * JSON text frames between a mesh node and the bridge. Packet bytes travel
 * base64-encoded; the bridge never looks inside them.
 */

import { z } from 'zod';

// Max frame size: 64KB
export const MAX_FRAME_SIZE = 64 * 1024;

// Mesh address: 1-64 chars, alphanumeric plus _ - . :
export const MeshAddressSchema = z.string().regex(/^[a-zA-Z0-9_.:-]{1,64}$/);

const Base64Schema = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/);

// ============================================
// Node -> Bridge
// ============================================

export const AttachFrameSchema = z.object({
  type: z.literal('attach'),
  address: MeshAddressSchema,
});

export const SendFrameSchema = z.object({
  type: z.literal('packet'),
  to: MeshAddressSchema,
  data: Base64Schema,
});

export const ClientFrameSchema = z.discriminatedUnion('type', [AttachFrameSchema, SendFrameSchema]);

export type AttachFrame = z.infer<typeof AttachFrameSchema>;
export type SendFrame = z.infer<typeof SendFrameSchema>;
export type ClientFrame = z.infer<typeof ClientFrameSchema>;

// ============================================
// Bridge -> Node
// ============================================

export const BridgeErrorCodeSchema = z.enum(['NOT_ATTACHED', 'BAD_FRAME', 'TOO_LARGE', 'REPLACED']);

export const AttachedFrameSchema = z.object({
  type: z.literal('attached'),
  address: MeshAddressSchema,
  /** Nodes attached, this one included */
  peers: z.number().int().nonnegative(),
});

export const DeliverFrameSchema = z.object({
  type: z.literal('packet'),
  from: MeshAddressSchema,
  data: Base64Schema,
});

export const BridgeErrorFrameSchema = z.object({
  type: z.literal('error'),
  code: BridgeErrorCodeSchema,
  message: z.string(),
});

export const ServerFrameSchema = z.discriminatedUnion('type', [
  AttachedFrameSchema,
  DeliverFrameSchema,
  BridgeErrorFrameSchema,
]);

export type BridgeErrorCode = z.infer<typeof BridgeErrorCodeSchema>;
export type AttachedFrame = z.infer<typeof AttachedFrameSchema>;
export type DeliverFrame = z.infer<typeof DeliverFrameSchema>;
export type BridgeErrorFrame = z.infer<typeof BridgeErrorFrameSchema>;
export type ServerFrame = z.infer<typeof ServerFrameSchema>;

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * Parse and validate a frame from a node; null when it is not one
 */
export function parseClientFrame(raw: string): ClientFrame | null {
  const parsed = ClientFrameSchema.safeParse(parseJson(raw));
  return parsed.success ? parsed.data : null;
}

/**
 * Parse and validate a frame from the bridge; null when it is not one
 */
export function parseServerFrame(raw: string): ServerFrame | null {
  const parsed = ServerFrameSchema.safeParse(parseJson(raw));
  return parsed.success ? parsed.data : null;
}

export function isFrameTooLarge(raw: string): boolean {
  return Buffer.byteLength(raw, 'utf8') > MAX_FRAME_SIZE;
}

export function encodePacket(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

export function decodePacket(data: string): Uint8Array {
  return new Uint8Array(Buffer.from(data, 'base64'));
}
