/**
 * @coldmesh/wallet-mock
 *
 * In-process wallet engine for tests and the relay's --mock-wallet mode.
 */

export {
  MockChain,
  MockViewWallet,
  MockWalletHost,
  DEFAULT_MOCK_FEE,
  UNLOCK_BLOCKS,
  type MockTransfer,
  type MockWalletHostOptions,
} from './mockEngine.js';
export { MockSigningWallet, mockKeyImage } from './mockSigner.js';
export { CallRecorder } from './calls.js';
export {
  decodeSigned,
  decodeUnsigned,
  encodeArtifact,
  signedTxHash,
  type SignedArtifact,
  type UnsignedArtifact,
} from './artifacts.js';
