#!/usr/bin/env node

/**
 * Atomic Planner - MCP Server Entry Point
 */

import { PlannerServer } from './server.js';

// Track server instance for cleanup on fatal errors
let serverInstance: PlannerServer | null = null;

async function shutdown(server: PlannerServer): Promise<void> {
  console.error('Shutting down atomic planner...');
  await server.stop();
  process.exit(0);
}

async function main(): Promise<void> {
  const server = new PlannerServer();
  serverInstance = server;

  process.on('SIGINT', () => {
    shutdown(server).catch((error: unknown) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  });

  process.on('SIGTERM', () => {
    shutdown(server).catch((error: unknown) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  });

  await server.start();
}

main().catch(async (error: unknown) => {
  console.error('Fatal error:', error);

  if (serverInstance) {
    try {
      await serverInstance.stop();
    } catch (cleanupError) {
      console.error('Error during cleanup:', cleanupError);
    }
  }

  process.exit(1);
});
