/**
 * WebSocket front of the mesh bridge
 */

import { randomUUID } from 'crypto';
import { WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import {
  describeConfigIssue,
  describeError,
  envLayer,
  flagLayer,
  mergeLayers,
  readConfigFile,
  silentLogger,
  type Binding,
  type ConfigLayer,
  type Logger,
} from '@coldmesh/protocol';
import { MeshBridge, type BridgePeer } from './bridge.js';

export const BridgeConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(0).max(65_535).default(8787),
  mtu: z.number().int().min(32).default(465),
  lossRate: z.number().min(0).max(1).default(0),
  duplicateRate: z.number().min(0).max(1).default(0),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

export const BRIDGE_ENV: Record<string, Binding> = {
  COLDMESH_BRIDGE_HOST: ['host', 'string'],
  COLDMESH_BRIDGE_PORT: ['port', 'int'],
  COLDMESH_MTU: ['mtu', 'int'],
  COLDMESH_BRIDGE_LOSS: ['lossRate', 'number'],
  COLDMESH_BRIDGE_DUPLICATES: ['duplicateRate', 'number'],
  COLDMESH_LOG_LEVEL: ['logLevel', 'string'],
};

export const BRIDGE_FLAGS: Record<string, Binding> = {
  '--config': ['configFile', 'string'],
  '--host': ['host', 'string'],
  '--port': ['port', 'int'],
  '--mtu': ['mtu', 'int'],
  '--loss': ['lossRate', 'number'],
  '--duplicates': ['duplicateRate', 'number'],
  '--log-level': ['logLevel', 'string'],
};

export async function loadBridgeConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<BridgeConfig> {
  const flags = flagLayer(argv, BRIDGE_FLAGS);
  const unknown = flags.rest[0];
  if (unknown !== undefined) {
    throw new Error(`Unknown argument: ${unknown}`);
  }
  const configFile = typeof flags.layer.configFile === 'string' ? flags.layer.configFile : env.COLDMESH_CONFIG;
  const fileLayer: ConfigLayer = configFile ? await readConfigFile(configFile) : {};

  const parsed = BridgeConfigSchema.safeParse(mergeLayers(fileLayer, envLayer(env, BRIDGE_ENV), flags.layer));
  if (!parsed.success) {
    throw new Error(`Invalid bridge configuration: ${describeConfigIssue(parsed.error)}`);
  }
  return parsed.data;
}

export interface BridgeServer {
  readonly bridge: MeshBridge;
  readonly url: string;
  close(): Promise<void>;
}

/** Listen for nodes; resolves once the port is bound */
export function startBridgeServer(config: BridgeConfig, logger: Logger = silentLogger): Promise<BridgeServer> {
  const bridge = new MeshBridge({
    mtu: config.mtu,
    lossRate: config.lossRate,
    duplicateRate: config.duplicateRate,
    logger,
  });

  const wss = new WebSocketServer({ host: config.host, port: config.port });

  wss.on('connection', (socket: WebSocket) => {
    const peer: BridgePeer = {
      id: randomUUID(),
      send: (text) => {
        if (socket.readyState === WebSocket.OPEN) {
          socket.send(text);
        }
      },
    };
    logger.info('connect', { peer: peer.id });

    socket.on('message', (data) => bridge.handleFrame(peer, data.toString()));
    socket.on('close', () => bridge.detach(peer));
    socket.on('error', (err) => logger.warn('socket_error', { peer: peer.id, error: err.message }));
  });

  return new Promise((resolve, reject) => {
    wss.once('error', reject);
    wss.once('listening', () => {
      wss.off('error', reject);
      wss.on('error', (err) => logger.error('server_error', { error: describeError(err) }));

      const address = wss.address();
      const port = typeof address === 'object' ? address.port : config.port;
      const url = `ws://${config.host}:${port}`;
      logger.info('server_start', { url, mtu: config.mtu, lossRate: config.lossRate });

      resolve({
        bridge,
        url,
        close: () =>
          new Promise<void>((done, fail) => {
            for (const client of wss.clients) {
              client.terminate();
            }
            wss.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}
