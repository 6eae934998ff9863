#!/usr/bin/env node

/**
 * Self-assessment MCP Server Entry Point
 */

import { AssessmentServer } from './server.js';
import { logger } from './utils/logger.js';

// Track server instance for cleanup on fatal errors
let serverInstance: AssessmentServer | null = null;

async function shutdown(server: AssessmentServer, signal: string): Promise<void> {
  logger.info('Shutting down', { signal });
  try {
    await server.stop();
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', error);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const server = new AssessmentServer();
  serverInstance = server;

  process.on('SIGINT', () => {
    void shutdown(server, 'SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown(server, 'SIGTERM');
  });

  await server.start();
}

main().catch(async (error: unknown) => {
  logger.error('Fatal error', error);

  // Close storage cleanly before exiting
  if (serverInstance) {
    try {
      await serverInstance.stop();
    } catch (cleanupError) {
      logger.error('Error during cleanup', cleanupError);
    }
  }

  process.exit(1);
});
