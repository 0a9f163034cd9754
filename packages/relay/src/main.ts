/**
 * Relay entry point
 * Usage: npm run relay -- [--mock-wallet] [--bridge ws://localhost:8787] [--wallet-rpc URL[,URL...]]
 */

import { createLogger, describeError, type Logger } from '@coldmesh/protocol';
import { WsMeshTransport } from '@coldmesh/mesh-bridge';
import { MockWalletHost } from '@coldmesh/wallet-mock';
import { RpcWalletHost, WalletRpcClient, parseXmr, type WalletHost } from '@coldmesh/wallet-rpc';
import { loadRelayConfig, type RelayConfig } from './config.js';
import { startRelayNode } from './node.js';
import { JsonSessionStore, MemorySessionStore } from './sessionStore.js';

async function createHost(config: RelayConfig, logger: Logger): Promise<WalletHost> {
  if (config.mockWallet) {
    logger.warn('mock_wallet', { note: 'in-process wallet engine; no funds are real' });
    return new MockWalletHost({ startingBalanceAtomic: parseXmr(config.mockBalance) });
  }
  const pool = config.walletRpcUrls.map(
    (url) => new WalletRpcClient({ url, timeoutMs: config.walletRpcTimeoutMs, logger: logger.child('rpc') }),
  );
  for (const rpc of pool) {
    const version = await rpc.getVersion();
    logger.info('wallet_rpc', { url: rpc.url, version });
  }
  return new RpcWalletHost({ pool, walletPassword: config.walletPassword, logger: logger.child('wallets') });
}

async function main() {
  const config = await loadRelayConfig(process.argv.slice(2));
  const logger = createLogger('relay', { level: config.logLevel });

  const host = await createHost(config, logger);
  const transport = new WsMeshTransport({
    url: config.bridgeUrl,
    address: config.address,
    logger: logger.child('mesh'),
  });
  await transport.ready();

  const node = await startRelayNode({
    config,
    transport,
    host,
    store: config.sessionsFile ? new JsonSessionStore(config.sessionsFile) : new MemorySessionStore(),
    logger,
  });

  console.log(`\nRelay ${config.address} attached to ${config.bridgeUrl}\n`);

  const shutdown = () => {
    node
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error('shutdown_failed', { error: describeError(err) });
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error(`Error: ${describeError(err)}`);
  process.exit(1);
});
