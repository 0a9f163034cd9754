/**
 * Wallet RPC Result Schemas
 *
 * Zod schemas for the JSON-RPC results this package reads. Field names are
 * the engine's own (snake_case); unknown fields are ignored.
 */

import { z } from 'zod';

/**
 * Atomic amount; the engine writes uint64 as a JSON number, some proxies as a string
 */
export const AtomicSchema = z
  .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)])
  .transform((v) => BigInt(v));

const HeightSchema = z.number().int().nonnegative();

export const BalanceResultSchema = z.object({
  balance: AtomicSchema,
  unlocked_balance: AtomicSchema,
  blocks_to_unlock: z.number().int().nonnegative().optional().default(0),
});

export const HeightResultSchema = z.object({
  height: HeightSchema,
});

export const RefreshResultSchema = z.object({
  blocks_fetched: z.number().int().nonnegative().optional(),
  received_money: z.boolean().optional(),
});

export const ExportOutputsResultSchema = z.object({
  outputs_data_hex: z.string(),
});

export const TransferResultSchema = z.object({
  amount: AtomicSchema,
  fee: AtomicSchema,
  tx_hash: z.string().optional(),
  tx_key: z.string().optional(),
  unsigned_txset: z.string().optional(),
  tx_metadata: z.string().optional(),
});

export const SubmitTransferResultSchema = z.object({
  tx_hash_list: z.array(z.string()),
});

export const ImportKeyImagesResultSchema = z.object({
  height: HeightSchema,
  spent: AtomicSchema,
  unspent: AtomicSchema,
});

export const TransferEntrySchema = z.object({
  txid: z.string(),
  height: HeightSchema,
  timestamp: z.number().int().nonnegative(),
  amount: AtomicSchema,
  fee: AtomicSchema.optional(),
  confirmations: z.number().int().nonnegative().optional(),
  address: z.string().optional(),
  type: z.string(),
});

export const GetTransfersResultSchema = z.object({
  in: z.array(TransferEntrySchema).optional().default([]),
  out: z.array(TransferEntrySchema).optional().default([]),
  pending: z.array(TransferEntrySchema).optional().default([]),
  pool: z.array(TransferEntrySchema).optional().default([]),
});

export const GetTransferByTxidResultSchema = z.object({
  transfer: TransferEntrySchema,
});

export const GenerateFromKeysResultSchema = z.object({
  address: z.string(),
  info: z.string().optional(),
});

export const EmptyResultSchema = z.object({}).passthrough();

export const ImportOutputsResultSchema = z.object({
  num_imported: z.number().int().nonnegative(),
});

export const SignTransferResultSchema = z.object({
  signed_txset: z.string(),
  tx_hash_list: z.array(z.string()),
});

export const ExportKeyImagesResultSchema = z.object({
  offset: z.number().int().nonnegative().optional().default(0),
  signed_key_images: z
    .array(z.object({ key_image: z.string(), signature: z.string() }))
    .optional()
    .default([]),
});

export const VersionResultSchema = z.object({
  version: z.number().int().nonnegative(),
});

export type RpcTransferEntry = z.output<typeof TransferEntrySchema>;
