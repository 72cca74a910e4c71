// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { createApp } from '@/api/app.js';
import { InMemoryEncounterRegistry } from '@/infrastructure/encounter/EncounterRegistry.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { apiLogger, engineLogger } from '@/utils/logger.js';

async function main(): Promise<void> {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }

  // Encounters are held in memory only
  const registry = new InMemoryEncounterRegistry(config.registry);

  // Log startup info
  console.log('========================================');
  console.log('  Encounter Server Starting...');
  console.log('========================================');
  console.log(`  Node Env: ${config.server.nodeEnv}`);
  console.log(`  Port: ${config.server.port}`);
  console.log(`  Turn order: ${config.engine.turnOrder} (initiative ${config.engine.initiativeDie})`);
  console.log(`  Step budget: ${config.engine.maxSteps}`);
  console.log(`  Max active encounters: ${config.registry.maxActiveEncounters}`);
  console.log('========================================');

  // Create Express app
  const app = createApp({
    registry,
    engineConfig: config.engine,
    engineLogger,
    corsOrigins: ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy: config.server.nodeEnv === 'production',
    logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
  });

  // Start server
  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`✓ Server running at http://${config.server.host}:${config.server.port}`);
    console.log(`✓ Health check: http://${config.server.host}:${config.server.port}/health`);
    console.log('========================================');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Starting graceful shutdown...`);
    server.close(() => {
      apiLogger.info('Server closed', { abandonedEncounters: registry.size });
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('✗ Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (err) => {
    console.error('Uncaught Exception:', err);
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason, promise) => {
    console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  });
}

// Run main
main().catch((error) => {
  console.error('Fatal error during startup:', error);
  process.exit(1);
});
