import { logger } from '@tfguard/shared-utils';
import { loadConfig } from './config';
import { startServer } from './server';

async function main() {
  try {
    const config = await loadConfig();
    logger.setLevel(config.logLevel);
    startServer(config);
    logger.info(`Terraform Tools Service started on port ${config.port}`);
  } catch (error) {
    logger.error('Failed to start Terraform Tools Service', error);
    process.exit(1);
  }
}

await main();
