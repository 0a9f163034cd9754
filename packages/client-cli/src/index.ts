/**
 * Coldmesh Client CLI
 *
 * Usage: npm run client -- <provision|balance|send|history|sync|watch> --operator <id> [options]
 */

import { createLogger, describeError, ReliableEndpoint, type Logger } from '@coldmesh/protocol';
import { WsMeshTransport } from '@coldmesh/mesh-bridge';
import { MockSigningWallet } from '@coldmesh/wallet-mock';
import { RpcSigningWallet, WalletRpcClient, type SigningWallet } from '@coldmesh/wallet-rpc';
import { loadClientConfig, parseArgs, type ClientConfig } from './cli.js';
import { runCommand } from './commands.js';
import { ColdClient } from './coldClient.js';

function log(message: string) {
  const time = new Date().toISOString();
  console.log(`[${time}] ${message}`);
}

function createSigner(config: ClientConfig, logger: Logger): SigningWallet {
  if (config.mockSigner) {
    logger.warn('mock_signer', { note: 'in-process signing wallet; no funds are real' });
    return new MockSigningWallet();
  }
  const rpc = new WalletRpcClient({
    url: config.signerRpcUrl,
    timeoutMs: config.signerRpcTimeoutMs,
    logger: logger.child('signer'),
  });
  return new RpcSigningWallet(rpc);
}

async function main() {
  const { command, settings } = parseArgs(process.argv.slice(2));
  const config = await loadClientConfig(settings);
  const logger = createLogger('client', { level: config.logLevel });

  const transport = new WsMeshTransport({
    url: config.bridgeUrl,
    address: config.address,
    logger: logger.child('mesh'),
  });
  await transport.ready();

  const endpoint = new ReliableEndpoint({
    transport,
    mtu: config.mtu,
    retry: config.retry,
    reassemblyTimeoutMs: config.reassemblyTimeoutMs,
    replayTtlMs: config.replayTtlMs,
    replayMaxEntries: config.replayMaxEntries,
    logger: logger.child('endpoint'),
  });
  const client = new ColdClient({
    endpoint,
    relayAddress: config.relayAddress,
    operatorId: config.operatorId,
    signer: createSigner(config, logger),
    logger,
  });

  log(`Operator ${config.operatorId} -> ${config.relayAddress} via ${config.bridgeUrl}`);

  const shutdown = async () => {
    await endpoint.close();
    await transport.close();
  };

  const unsubscribe = await runCommand(client, command, log);
  if (command.command !== 'watch') {
    await shutdown();
    return;
  }

  const stop = () => {
    unsubscribe();
    shutdown()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error(`Error: ${describeError(err)}`);
        process.exit(1);
      });
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
}

main().catch((err) => {
  console.error(`Error: ${describeError(err)}`);
  console.error('');
  console.error('Usage: npm run client -- <command> --operator <id> [options]');
  console.error('');
  console.error('Commands:');
  console.error('  provision   --view-key <hex> --wallet-address <addr> [--restore-height N] [--wallet-name NAME]');
  console.error('  balance');
  console.error('  send        --dest <addr> --amount <xmr> [--priority 0-3]');
  console.error('  history     [--limit N] [--min-height N]');
  console.error('  sync        [--new-only]');
  console.error('  watch');
  console.error('');
  console.error('Options:');
  console.error('  --operator       Required. Operator id');
  console.error('  --bridge         Mesh bridge URL (default: ws://localhost:8787)');
  console.error('  --address        This node\'s mesh address (default: cold-client)');
  console.error('  --relay-address  Relay mesh address (default: relay)');
  console.error('  --signer-rpc     Offline wallet-rpc URL (default: http://127.0.0.1:18083/json_rpc)');
  console.error('  --mock-signer    Sign with the in-process mock wallet');
  console.error('  --config         JSON config file');
  console.error('  --log-level      debug, info, warn or error (default: warn)');
  process.exit(1);
});
