/**
 * @coldmesh/mesh-bridge
 *
 * WebSocket packet switch standing in for the radio mesh, and the
 * transport that attaches a node to it.
 */

export { MeshBridge, type BridgePeer, type BridgeStats, type MeshBridgeOptions } from './bridge.js';
export {
  BridgeConfigSchema,
  BRIDGE_ENV,
  BRIDGE_FLAGS,
  loadBridgeConfig,
  startBridgeServer,
  type BridgeConfig,
  type BridgeServer,
} from './server.js';
export {
  WsMeshTransport,
  DEFAULT_RECONNECT,
  openWebSocket,
  type SocketFactory,
  type SocketHandle,
  type SocketHandlers,
  type WsMeshTransportOptions,
} from './wsTransport.js';
export {
  MAX_FRAME_SIZE,
  MeshAddressSchema,
  parseClientFrame,
  parseServerFrame,
  encodePacket,
  decodePacket,
  type ClientFrame,
  type ServerFrame,
  type BridgeErrorCode,
} from './frames.js';
