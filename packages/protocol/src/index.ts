/**
 * Coldmesh Protocol Package
 *
 * Message catalog and codec, fragmentation, the reliable request/response
 * endpoint and the error taxonomy shared by the relay node and the cold side.
 */

// Message schemas and types
export {
  OperatorIdSchema,
  RequestIdSchema,
  XmrAmountSchema,
  WalletAddressSchema,
  ProvisionWalletSchema,
  ProvisionAckSchema,
  BalanceRequestSchema,
  BalanceResponseSchema,
  CreateTransactionSchema,
  UnsignedTransactionSchema,
  SignedTransactionSchema,
  TransactionResultSchema,
  TransactionHistorySchema,
  TransferEntrySchema,
  HistoryResponseSchema,
  ExportOutputsSchema,
  OutputsResponseSchema,
  ImportKeyImagesSchema,
  KeyImagesAppliedSchema,
  ErrorMessageSchema,
  StatusMessageSchema,
  RequestMessageSchema,
  ResponseMessageSchema,
  MessageSchema,
  RESPONSE_KIND,
  isKnownKind,
  isRequest,
  isRequestKind,
  isResponse,
  responseKindFor,
  parseMessage,
  type Message,
  type MessageKind,
  type RequestMessage,
  type RequestKind,
  type ResponseMessage,
  type ResponseKind,
  type ResponseFor,
  type RequestOf,
  type ProvisionWallet,
  type ProvisionAck,
  type BalanceRequest,
  type BalanceResponse,
  type CreateTransaction,
  type UnsignedTransaction,
  type SignedTransaction,
  type TransactionResult,
  type TransactionStatus,
  type TransactionHistory,
  type TransferEntry,
  type HistoryResponse,
  type ExportOutputs,
  type OutputsResponse,
  type SignedKeyImage,
  type ImportKeyImages,
  type KeyImagesApplied,
  type ErrorMessage,
  type StatusEvent,
  type StatusMessage,
} from './messages.js';

// Binary codec
export { encodeMessage, decodeMessage, PROTOCOL_MAGIC, PROTOCOL_VERSION } from './codec.js';

// Errors
export {
  ErrorCodeSchema,
  ProtocolError,
  isProtocolError,
  isTransientCode,
  describeError,
  type ErrorCode,
  type ProtocolErrorContext,
} from './errors.js';

// Canonical serialization
export { canonicalize, canonicalStringify, canonicalDigest } from './canonical.js';

// Hex validation
export { assertHex32, isHexBlob, Hex32Schema, HexBlobSchema, type Hex32 } from './hex.js';

// Fragmentation
export {
  encodeFragment,
  decodeFragment,
  fragmentOverhead,
  fragmentPayload,
  Reassembler,
  FRAME_FRAGMENT,
  MAX_FRAGMENT_INDEX,
  type Fragment,
  type FragmentKey,
  type ReassemblerOptions,
} from './fragments.js';

// Retry policy
export { BackoffPolicySchema, DEFAULT_BACKOFF, backoffDelay, sleep, type BackoffPolicy } from './backoff.js';

// Replay cache
export { ReplayCache, type ReplayKey, type ReplayOutcome, type ReplayResult, type ReplayCacheOptions } from './replayCache.js';

// Transport
export type { MeshTransport, ReceiveHandler } from './transport.js';
export {
  createMemoryMesh,
  type MemoryMesh,
  type MemoryMeshOptions,
  type MeshPacket,
  type MeshStats,
  type PacketFilter,
} from './memoryMesh.js';

// Reliable endpoint
export {
  ReliableEndpoint,
  errorResponse,
  type EndpointOptions,
  type RequestHandler,
  type StatusHandler,
} from './endpoint.js';

// Logging
export {
  createLogger,
  silentLogger,
  formatLine,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogDetails,
  type LogSink,
  type LoggerOptions,
} from './log.js';

// Serial execution
export { SerialQueue } from './serial.js';

// Configuration layers
export {
  EndpointConfigSchema,
  RetryConfigSchema,
  ENDPOINT_ENV,
  ENDPOINT_FLAGS,
  mergeLayers,
  setPath,
  convertValue,
  envLayer,
  flagLayer,
  readConfigFile,
  describeConfigIssue,
  type EndpointConfig,
  type ConfigLayer,
  type Binding,
  type ValueKind,
  type FlagParse,
} from './config.js';
