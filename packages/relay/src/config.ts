/**
 * Relay Configuration
 *
 * defaults <- JSON file (--config / COLDMESH_CONFIG) <- COLDMESH_* env <- flags
 */

import { z } from 'zod';
import {
  ENDPOINT_ENV,
  ENDPOINT_FLAGS,
  EndpointConfigSchema,
  XmrAmountSchema,
  describeConfigIssue,
  envLayer,
  flagLayer,
  mergeLayers,
  readConfigFile,
  type Binding,
  type ConfigLayer,
} from '@coldmesh/protocol';

export const RelayConfigSchema = EndpointConfigSchema.extend({
  /** This node's mesh address */
  address: z.string().min(1).default('relay'),
  bridgeUrl: z.string().url().default('ws://localhost:8787'),
  /** One wallet-rpc process per entry (comma-separated from env and flags); wallets are spread across them */
  walletRpcUrls: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.split(',').map((url) => url.trim()) : value),
      z.array(z.string().url()).min(1),
    )
    .default(['http://127.0.0.1:18082/json_rpc']),
  walletPassword: z.string().default(''),
  walletRpcTimeoutMs: z.number().int().positive().default(120_000),
  /** Use the in-process wallet engine instead of wallet-rpc */
  mockWallet: z.boolean().default(false),
  /** Funds each mock wallet starts with, in XMR */
  mockBalance: XmrAmountSchema.default('10'),
  /** Where the operator -> wallet mapping is kept; in memory only when unset */
  sessionsFile: z.string().min(1).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  intentTtlMs: z.number().int().positive().default(1_800_000),
  intentSweepMs: z.number().int().positive().default(60_000),
  intentArchiveSize: z.number().int().positive().default(1000),
  confirmations: z.number().int().min(1).default(10),
  confirmationPollMs: z.number().int().positive().default(120_000),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export const RELAY_ENV: Record<string, Binding> = {
  ...ENDPOINT_ENV,
  COLDMESH_ADDRESS: ['address', 'string'],
  COLDMESH_BRIDGE_URL: ['bridgeUrl', 'string'],
  COLDMESH_WALLET_RPC_URLS: ['walletRpcUrls', 'string'],
  COLDMESH_WALLET_PASSWORD: ['walletPassword', 'string'],
  COLDMESH_MOCK_WALLET: ['mockWallet', 'bool'],
  COLDMESH_SESSIONS_FILE: ['sessionsFile', 'string'],
  COLDMESH_LOG_LEVEL: ['logLevel', 'string'],
  COLDMESH_INTENT_TTL_MS: ['intentTtlMs', 'int'],
  COLDMESH_CONFIRMATIONS: ['confirmations', 'int'],
  COLDMESH_CONFIRMATION_POLL_MS: ['confirmationPollMs', 'int'],
};

export const RELAY_FLAGS: Record<string, Binding> = {
  ...ENDPOINT_FLAGS,
  '--config': ['configFile', 'string'],
  '--address': ['address', 'string'],
  '--bridge': ['bridgeUrl', 'string'],
  '--wallet-rpc': ['walletRpcUrls', 'string'],
  '--wallet-password': ['walletPassword', 'string'],
  '--mock-wallet': ['mockWallet', 'bool'],
  '--mock-balance': ['mockBalance', 'string'],
  '--sessions-file': ['sessionsFile', 'string'],
  '--log-level': ['logLevel', 'string'],
  '--intent-ttl-ms': ['intentTtlMs', 'int'],
  '--confirmations': ['confirmations', 'int'],
  '--confirmation-poll-ms': ['confirmationPollMs', 'int'],
};

/**
 * Build the relay config from process arguments and environment.
 * @param argv - arguments after the script name
 */
export async function loadRelayConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<RelayConfig> {
  const flags = flagLayer(argv, RELAY_FLAGS);
  const unknown = flags.rest[0];
  if (unknown !== undefined) {
    throw new Error(`Unknown argument: ${unknown}`);
  }

  const configFile = typeof flags.layer.configFile === 'string' ? flags.layer.configFile : env.COLDMESH_CONFIG;
  const fileLayer: ConfigLayer = configFile ? await readConfigFile(configFile) : {};

  const parsed = RelayConfigSchema.safeParse(mergeLayers(fileLayer, envLayer(env, RELAY_ENV), flags.layer));
  if (!parsed.success) {
    throw new Error(`Invalid relay configuration: ${describeConfigIssue(parsed.error)}`);
  }
  return parsed.data;
}
