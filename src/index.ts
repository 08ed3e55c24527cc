import { loadConfigFromEnvironment, ConfigError, RegistryConfig } from './config';
import { StructuredLogger } from './logging/structured-logger';
import { ArtworkRegistry } from './registry';
import { RegistrySnapshotStore } from './storage';
import { RegistryAPIServer } from './api/api-server';

function readConfig(): RegistryConfig {
  try {
    return loadConfigFromEnvironment();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('ERROR: Missing or invalid environment variables:');
      error.problems.forEach(p => console.error(`  - ${p}`));
      console.error('\nPlease configure these in your .env file (see .env.example).');
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const logger = new StructuredLogger({ minLevel: config.logLevel, json: config.jsonLogs });

  logger.info('Node', 'Starting artwork registry', {
    admin: config.adminId,
    port: config.port,
    dataDir: config.dataDir ?? '(in-memory)',
  });

  const snapshotStore = config.dataDir ? new RegistrySnapshotStore(config.dataDir, logger) : undefined;
  if (snapshotStore) {
    logger.info('Node', 'Persisting registry state', { file: snapshotStore.getFilePath() });
  }

  const registry = new ArtworkRegistry({ admin: config.adminId, logger, snapshotStore });
  const server = new RegistryAPIServer(registry, logger);

  const shutdown = (signal: string): void => {
    logger.info('Node', `Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      err => {
        logger.error('Node', 'Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start(config.port);
}

main().catch(error => {
  console.error('FATAL ERROR:', error instanceof Error ? error.stack ?? error.message : error);
  process.exit(1);
});
