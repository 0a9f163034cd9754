/**
 * Coldmesh Message Catalog
 *
 * Every message exchanged between the cold side and the relay node, as zod
 * schemas over one discriminated union keyed by `kind`. Each request kind is
 * answered by exactly one response kind (or an `error`); `status` is the only
 * unsolicited message.
 *
 * Amounts are XMR decimal strings (at most 12 fractional digits) unless the
 * field name ends in `Atomic`, in which case they are atomic-unit integers as
 * decimal strings.
 */

import { z } from 'zod';
import { ErrorCodeSchema } from './errors.js';
import { Hex32Schema, HexBlobSchema } from './hex.js';

// ============================================
// Field Schemas
// ============================================

export const OperatorIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]{1,64}$/, 'Operator id must be 1-64 chars of [A-Za-z0-9_.-]');

export const RequestIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, 'Request id must be 1-64 chars of [A-Za-z0-9_-]');

/** Atomic units as a decimal string: digits only */
const AtomicStringSchema = z.string().regex(/^\d+$/, 'Must be a decimal string (digits only)');

/** XMR amount: integer part plus up to 12 fractional digits */
export const XmrAmountSchema = z
  .string()
  .regex(/^\d+(?:\.\d{1,12})?$/, 'Must be an XMR amount with at most 12 decimals');

/** Standard (95 chars) or integrated (106 chars) base58 address */
export const WalletAddressSchema = z
  .string()
  .regex(/^[1-9A-HJ-NP-Za-km-z]{95}(?:[1-9A-HJ-NP-Za-km-z]{11})?$/, 'Must be a base58 wallet address');

const HeightSchema = z.number().int().nonnegative();
const TimestampSchema = z.number().int().nonnegative();
const PrioritySchema = z.number().int().min(0).max(3);

const BaseSchema = z.object({
  operatorId: OperatorIdSchema,
  requestId: RequestIdSchema,
});

// ============================================
// Provisioning
// ============================================

export const ProvisionWalletSchema = BaseSchema.extend({
  kind: z.literal('provision_wallet'),
  viewKey: Hex32Schema,
  walletAddress: WalletAddressSchema,
  restoreHeight: HeightSchema,
  walletName: z.string().min(1).max(64).optional(),
});

export const ProvisionAckSchema = BaseSchema.extend({
  kind: z.literal('provision_ack'),
  success: z.boolean(),
  status: z.string(),
  scanStarted: z.boolean(),
});

// ============================================
// Balance
// ============================================

export const BalanceRequestSchema = BaseSchema.extend({
  kind: z.literal('balance_request'),
});

export const BalanceResponseSchema = BaseSchema.extend({
  kind: z.literal('balance_response'),
  balance: XmrAmountSchema,
  unlockedBalance: XmrAmountSchema,
  balanceAtomic: AtomicStringSchema,
  unlockedAtomic: AtomicStringSchema,
  syncHeight: HeightSchema,
  blocksToUnlock: HeightSchema,
  /** Set when the engine was unreachable and the last good reading was served (epoch ms) */
  cachedAt: z.number().int().nonnegative().optional(),
});

// ============================================
// Cold-signing exchange
// ============================================

export const CreateTransactionSchema = BaseSchema.extend({
  kind: z.literal('create_transaction'),
  destination: WalletAddressSchema,
  amount: XmrAmountSchema,
  priority: PrioritySchema,
});

export const UnsignedTransactionSchema = BaseSchema.extend({
  kind: z.literal('unsigned_transaction'),
  unsignedArtifact: HexBlobSchema,
  txKey: HexBlobSchema,
  fee: XmrAmountSchema,
  total: XmrAmountSchema,
  change: XmrAmountSchema,
  /** Epoch ms after which the relay no longer accepts a signature */
  expiresAt: TimestampSchema,
});

export const SignedTransactionSchema = BaseSchema.extend({
  kind: z.literal('signed_transaction'),
  signedArtifact: HexBlobSchema,
  /** Transaction key reported by the signer; must match the unsigned artifact's */
  txKey: HexBlobSchema,
});

export const TransactionStatusSchema = z.enum(['broadcast', 'pending', 'confirmed']);

export const TransactionResultSchema = BaseSchema.extend({
  kind: z.literal('transaction_result'),
  txHash: Hex32Schema,
  txKey: HexBlobSchema,
  fee: XmrAmountSchema,
  status: TransactionStatusSchema,
});

// ============================================
// History
// ============================================

export const TransactionHistorySchema = BaseSchema.extend({
  kind: z.literal('transaction_history'),
  limit: z.number().int().min(1).max(100),
  minHeight: HeightSchema,
});

export const TransferEntrySchema = z.object({
  hash: Hex32Schema,
  height: HeightSchema,
  timestamp: TimestampSchema,
  amount: XmrAmountSchema,
  fee: XmrAmountSchema,
  direction: z.enum(['in', 'out']),
  confirmations: z.number().int().nonnegative(),
  counterparty: z.string().optional(),
});

export const HistoryResponseSchema = BaseSchema.extend({
  kind: z.literal('history_response'),
  transfers: z.array(TransferEntrySchema),
});

// ============================================
// Output / key-image synchronization
// ============================================

export const ExportOutputsSchema = BaseSchema.extend({
  kind: z.literal('export_outputs'),
  all: z.boolean(),
});

export const OutputsResponseSchema = BaseSchema.extend({
  kind: z.literal('outputs_response'),
  outputsDataHex: z.string().regex(/^(?:[0-9a-f]{2})*$/, 'Must be lowercase hex'),
});

export const SignedKeyImageSchema = z.object({
  keyImage: Hex32Schema,
  signature: HexBlobSchema,
});

export const ImportKeyImagesSchema = BaseSchema.extend({
  kind: z.literal('import_key_images'),
  batchId: RequestIdSchema,
  exportedAt: TimestampSchema,
  signedKeyImages: z.array(SignedKeyImageSchema),
  offset: z.number().int().nonnegative(),
});

export const KeyImagesAppliedSchema = BaseSchema.extend({
  kind: z.literal('key_images_applied'),
  batchId: RequestIdSchema,
  height: HeightSchema,
  spent: XmrAmountSchema,
  unspent: XmrAmountSchema,
});

// ============================================
// Errors and status pushes
// ============================================

export const ErrorMessageSchema = BaseSchema.extend({
  kind: z.literal('error'),
  code: ErrorCodeSchema,
  message: z.string(),
});

export const StatusEventSchema = z.enum([
  'scan_started',
  'scan_complete',
  'scan_failed',
  'tx_broadcast',
  'tx_confirmed',
  'intent_expired',
  'balance_stale',
]);

/**
 * Unsolicited relay -> client notice. Its requestId is a push id chosen by
 * the relay; nothing answers it.
 */
export const StatusMessageSchema = BaseSchema.extend({
  kind: z.literal('status'),
  event: StatusEventSchema,
  txHash: Hex32Schema.optional(),
  amount: XmrAmountSchema.optional(),
  message: z.string(),
  timestamp: TimestampSchema,
});

// ============================================
// Union Message Type
// ============================================

export const RequestMessageSchema = z.discriminatedUnion('kind', [
  ProvisionWalletSchema,
  BalanceRequestSchema,
  CreateTransactionSchema,
  SignedTransactionSchema,
  TransactionHistorySchema,
  ExportOutputsSchema,
  ImportKeyImagesSchema,
]);

export const ResponseMessageSchema = z.discriminatedUnion('kind', [
  ProvisionAckSchema,
  BalanceResponseSchema,
  UnsignedTransactionSchema,
  TransactionResultSchema,
  HistoryResponseSchema,
  OutputsResponseSchema,
  KeyImagesAppliedSchema,
  ErrorMessageSchema,
]);

export const MessageSchema = z.discriminatedUnion('kind', [
  ProvisionWalletSchema,
  BalanceRequestSchema,
  CreateTransactionSchema,
  SignedTransactionSchema,
  TransactionHistorySchema,
  ExportOutputsSchema,
  ImportKeyImagesSchema,
  ProvisionAckSchema,
  BalanceResponseSchema,
  UnsignedTransactionSchema,
  TransactionResultSchema,
  HistoryResponseSchema,
  OutputsResponseSchema,
  KeyImagesAppliedSchema,
  ErrorMessageSchema,
  StatusMessageSchema,
]);

export type Message = z.infer<typeof MessageSchema>;
export type RequestMessage = z.infer<typeof RequestMessageSchema>;
export type ResponseMessage = z.infer<typeof ResponseMessageSchema>;
export type MessageKind = Message['kind'];
export type RequestKind = RequestMessage['kind'];
export type ResponseKind = ResponseMessage['kind'];

export type ProvisionWallet = z.infer<typeof ProvisionWalletSchema>;
export type ProvisionAck = z.infer<typeof ProvisionAckSchema>;
export type BalanceRequest = z.infer<typeof BalanceRequestSchema>;
export type BalanceResponse = z.infer<typeof BalanceResponseSchema>;
export type CreateTransaction = z.infer<typeof CreateTransactionSchema>;
export type UnsignedTransaction = z.infer<typeof UnsignedTransactionSchema>;
export type SignedTransaction = z.infer<typeof SignedTransactionSchema>;
export type TransactionResult = z.infer<typeof TransactionResultSchema>;
export type TransactionStatus = z.infer<typeof TransactionStatusSchema>;
export type TransactionHistory = z.infer<typeof TransactionHistorySchema>;
export type TransferEntry = z.infer<typeof TransferEntrySchema>;
export type HistoryResponse = z.infer<typeof HistoryResponseSchema>;
export type ExportOutputs = z.infer<typeof ExportOutputsSchema>;
export type OutputsResponse = z.infer<typeof OutputsResponseSchema>;
export type SignedKeyImage = z.infer<typeof SignedKeyImageSchema>;
export type ImportKeyImages = z.infer<typeof ImportKeyImagesSchema>;
export type KeyImagesApplied = z.infer<typeof KeyImagesAppliedSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;
export type StatusEvent = z.infer<typeof StatusEventSchema>;
export type StatusMessage = z.infer<typeof StatusMessageSchema>;

// ============================================
// Request / response pairing
// ============================================

export const RESPONSE_KIND = {
  provision_wallet: 'provision_ack',
  balance_request: 'balance_response',
  create_transaction: 'unsigned_transaction',
  signed_transaction: 'transaction_result',
  transaction_history: 'history_response',
  export_outputs: 'outputs_response',
  import_key_images: 'key_images_applied',
} as const satisfies Record<RequestKind, ResponseKind>;

export type ResponseFor<K extends RequestKind> = Extract<Message, { kind: (typeof RESPONSE_KIND)[K] }>;

export type RequestOf<K extends RequestKind> = Extract<RequestMessage, { kind: K }>;

const REQUEST_KINDS: ReadonlySet<string> = new Set(Object.keys(RESPONSE_KIND));
const MESSAGE_KINDS: ReadonlySet<string> = new Set(MessageSchema.options.map((o) => o.shape.kind.value));

export function isKnownKind(kind: string): kind is MessageKind {
  return MESSAGE_KINDS.has(kind);
}

export function isRequestKind(kind: string): kind is RequestKind {
  return REQUEST_KINDS.has(kind);
}

export function isRequest(msg: Message): msg is RequestMessage {
  return REQUEST_KINDS.has(msg.kind);
}

export function isResponse(msg: Message): msg is ResponseMessage {
  return !REQUEST_KINDS.has(msg.kind) && msg.kind !== 'status';
}

export function responseKindFor(kind: RequestKind): ResponseKind {
  return RESPONSE_KIND[kind];
}

/**
 * Parse and validate a plain value as a protocol message.
 * Throws ZodError if validation fails.
 */
export function parseMessage(json: unknown): Message {
  return MessageSchema.parse(json);
}
