/**
 * @coldmesh/relay
 *
 * Relay node: operator sessions, the cold-signing flow and the request
 * router. `main.ts` runs it as a process.
 */

export { startRelayNode, type RelayNode, type RelayNodeConfig, type RelayNodeOptions } from './node.js';
export { loadRelayConfig, RelayConfigSchema, RELAY_ENV, RELAY_FLAGS, type RelayConfig } from './config.js';
export {
  JsonSessionStore,
  MemorySessionStore,
  StoredOperatorSchema,
  type SessionStore,
  type StoredOperator,
} from './sessionStore.js';
export {
  SessionRegistry,
  credentialFingerprint,
  walletNameFor,
  type OperatorSession,
  type ScanState,
} from './sessions.js';
export { RelayRouter } from './router.js';
export { ConfirmationWatcher } from './watcher.js';
export { IntentBook, type IntentState, type TransactionIntent } from './intents.js';
export { KeyImageLedger, type KeyImageBatch } from './keyImages.js';
