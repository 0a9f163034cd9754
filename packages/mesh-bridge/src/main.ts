/**
 * Mesh bridge entry point
 * Usage: npm run bridge -- [--port 8787] [--mtu 465] [--loss 0.1] [--duplicates 0.05]
 */

import { createLogger, describeError } from '@coldmesh/protocol';
import { loadBridgeConfig, startBridgeServer } from './server.js';

async function main() {
  const config = await loadBridgeConfig(process.argv.slice(2));
  const logger = createLogger('bridge', { level: config.logLevel });
  const server = await startBridgeServer(config, logger);

  console.log(`\nMesh bridge running at ${server.url}\n`);

  const shutdown = () => {
    server
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
