/**
 * CLI Argument Parsing
 *
 * `coldmesh <command> [options]`. Command options are read here; anything
 * else is a client setting and goes through the config layers.
 */

import { z } from 'zod';
import {
  ENDPOINT_ENV,
  ENDPOINT_FLAGS,
  EndpointConfigSchema,
  Hex32Schema,
  OperatorIdSchema,
  WalletAddressSchema,
  XmrAmountSchema,
  describeConfigIssue,
  envLayer,
  flagLayer,
  mergeLayers,
  readConfigFile,
  type Binding,
  type ConfigLayer,
} from '@coldmesh/protocol';

export const COMMANDS = ['provision', 'balance', 'send', 'history', 'sync', 'watch'] as const;

export type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

const ProvisionArgsSchema = z.object({
  command: z.literal('provision'),
  viewKey: Hex32Schema,
  walletAddress: WalletAddressSchema,
  restoreHeight: z.number().int().nonnegative(),
  walletName: z.string().min(1).max(64).optional(),
});

const SendArgsSchema = z.object({
  command: z.literal('send'),
  destination: WalletAddressSchema,
  amount: XmrAmountSchema,
  priority: z.number().int().min(0).max(3),
});

const HistoryArgsSchema = z.object({
  command: z.literal('history'),
  limit: z.number().int().min(1).max(100),
  minHeight: z.number().int().nonnegative(),
});

export type ProvisionArgs = z.infer<typeof ProvisionArgsSchema>;
export type SendArgs = z.infer<typeof SendArgsSchema>;
export type HistoryArgs = z.infer<typeof HistoryArgsSchema>;

export type CommandArgs =
  | ProvisionArgs
  | SendArgs
  | HistoryArgs
  | { command: 'balance' }
  | { command: 'sync'; all: boolean }
  | { command: 'watch' };

export interface ParsedArgs {
  command: CommandArgs;
  /** Arguments left for the config flags */
  settings: string[];
}

function parseInteger(flag: string, raw: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`${flag} must be an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function checked<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, command: Command, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid ${command} arguments: ${describeConfigIssue(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Parse command line arguments
 * @param args - arguments after the script name
 */
export function parseArgs(args: string[]): ParsedArgs {
  const name = args[0];
  if (!isCommand(name)) {
    throw new Error(name ? `Unknown command: ${name}` : 'A command is required');
  }

  // Defaults
  let viewKey: string | undefined;
  let walletAddress: string | undefined;
  let restoreHeight = 0;
  let walletName: string | undefined;
  let destination: string | undefined;
  let amount: string | undefined;
  let priority = 0;
  let limit = 20;
  let minHeight = 0;
  let all = true;
  const settings: string[] = [];

  for (let i = 1; i < args.length; i++) {
    const arg = args[i] ?? '';
    const value = (): string => {
      const next = args[i + 1];
      if (next === undefined) {
        throw new Error(`${arg} needs a value`);
      }
      i++;
      return next;
    };

    switch (arg) {
      case '--view-key':
        viewKey = value();
        break;
      case '--wallet-address':
        walletAddress = value();
        break;
      case '--restore-height':
        restoreHeight = parseInteger(arg, value());
        break;
      case '--wallet-name':
        walletName = value();
        break;
      case '--dest':
        destination = value();
        break;
      case '--amount':
        amount = value();
        break;
      case '--priority':
        priority = parseInteger(arg, value());
        break;
      case '--limit':
        limit = parseInteger(arg, value());
        break;
      case '--min-height':
        minHeight = parseInteger(arg, value());
        break;
      case '--new-only':
        all = false;
        break;
      default:
        settings.push(arg);
    }
  }

  switch (name) {
    case 'provision':
      if (!viewKey) throw new Error('--view-key is required');
      if (!walletAddress) throw new Error('--wallet-address is required');
      return {
        command: checked(ProvisionArgsSchema, name, { command: name, viewKey, walletAddress, restoreHeight, walletName }),
        settings,
      };
    case 'send':
      if (!destination) throw new Error('--dest is required');
      if (!amount) throw new Error('--amount is required');
      return { command: checked(SendArgsSchema, name, { command: name, destination, amount, priority }), settings };
    case 'history':
      return { command: checked(HistoryArgsSchema, name, { command: name, limit, minHeight }), settings };
    case 'sync':
      return { command: { command: name, all }, settings };
    case 'balance':
    case 'watch':
      return { command: { command: name }, settings };
  }
}

// ============================================
// Client settings
// ============================================

export const ClientConfigSchema = EndpointConfigSchema.extend({
  operatorId: OperatorIdSchema,
  /** This node's mesh address */
  address: z.string().min(1).default('cold-client'),
  relayAddress: z.string().min(1).default('relay'),
  bridgeUrl: z.string().url().default('ws://localhost:8787'),
  /** Offline wallet-rpc holding the full wallet */
  signerRpcUrl: z.string().url().default('http://127.0.0.1:18083/json_rpc'),
  signerRpcTimeoutMs: z.number().int().positive().default(120_000),
  /** Sign with the in-process mock wallet (pairs with a relay in --mock-wallet mode) */
  mockSigner: z.boolean().default(false),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export const CLIENT_ENV: Record<string, Binding> = {
  ...ENDPOINT_ENV,
  COLDMESH_OPERATOR: ['operatorId', 'string'],
  COLDMESH_CLIENT_ADDRESS: ['address', 'string'],
  COLDMESH_RELAY_ADDRESS: ['relayAddress', 'string'],
  COLDMESH_BRIDGE_URL: ['bridgeUrl', 'string'],
  COLDMESH_SIGNER_RPC_URL: ['signerRpcUrl', 'string'],
  COLDMESH_MOCK_SIGNER: ['mockSigner', 'bool'],
  COLDMESH_LOG_LEVEL: ['logLevel', 'string'],
};

export const CLIENT_FLAGS: Record<string, Binding> = {
  ...ENDPOINT_FLAGS,
  '--config': ['configFile', 'string'],
  '--operator': ['operatorId', 'string'],
  '--address': ['address', 'string'],
  '--relay-address': ['relayAddress', 'string'],
  '--bridge': ['bridgeUrl', 'string'],
  '--signer-rpc': ['signerRpcUrl', 'string'],
  '--mock-signer': ['mockSigner', 'bool'],
  '--log-level': ['logLevel', 'string'],
};

export async function loadClientConfig(settings: string[], env: NodeJS.ProcessEnv = process.env): Promise<ClientConfig> {
  const flags = flagLayer(settings, CLIENT_FLAGS);
  const unknown = flags.rest[0];
  if (unknown !== undefined) {
    throw new Error(`Unknown argument: ${unknown}`);
  }

  const configFile = typeof flags.layer.configFile === 'string' ? flags.layer.configFile : env.COLDMESH_CONFIG;
  const fileLayer: ConfigLayer = configFile ? await readConfigFile(configFile) : {};

  const parsed = ClientConfigSchema.safeParse(mergeLayers(fileLayer, envLayer(env, CLIENT_ENV), flags.layer));
  if (!parsed.success) {
    throw new Error(`Invalid client configuration: ${describeConfigIssue(parsed.error)}`);
  }
  return parsed.data;
}
