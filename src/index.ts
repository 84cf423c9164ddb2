import * as dotenv from 'dotenv';
import { MarketplaceAPIServer } from './api/marketplace-api';
import { ConfigError, loadNodeConfig, NodeConfig } from './config';
import { Devnet } from './devnet/devnet';
import { logger } from './logging/structured-logger';

dotenv.config();

function readConfig(): NodeConfig {
  try {
    return loadNodeConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`ERROR: ${error.message}`);
      console.error('\nPlease fix these in your .env file (see .env.example).');
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = readConfig();

  logger.setLevel(config.logLevel);
  logger.info('Node', 'Starting settlement devnet node', {
    port: config.port,
    chains: (config.devnet.chains ?? []).map(c => c.chainId).join(', '),
    feeBps: config.devnet.feeBps,
  });

  const devnet = Devnet.create(config.devnet);
  const server = new MarketplaceAPIServer(devnet, config.port);

  const shutdown = async (signal: string) => {
    logger.info('Node', `Received ${signal}, shutting down gracefully...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Node', 'Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    }
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.start();
}

main().catch(error => {
  logger.error('Node', 'Fatal error', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
