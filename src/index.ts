#!/usr/bin/env node
import { startServer } from './server.js';
import { logError, logInfo } from './services/logger.js';
import { getErrorMessage } from './utils/error-utils.js';

const SHUTDOWN_TIMEOUT_MS = 10_000;

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.stderr.write(`Uncaught exception: ${error.message}\n`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});

const { server, deps } = await startServer();
let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logInfo(`${signal} received, shutting down`);

  setTimeout(() => {
    logError('Forced shutdown after timeout');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS).unref();

  await new Promise<void>((resolve) => {
    server.close(() => {
      logInfo('HTTP server closed');
      resolve();
    });
  });

  try {
    await deps.transport.close();
  } catch (error) {
    logError('Failed to close outbound connections', {
      error: getErrorMessage(error),
    });
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
