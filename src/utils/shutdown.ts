import chalk from 'chalk';
import { logger } from './logger';

let isShuttingDown = false;
const cleanupHandlers: Array<() => Promise<void> | void> = [];

/**
 * Register cleanup handler; returns a function that unregisters it
 */
export function onShutdown(handler: () => Promise<void> | void): () => void {
  cleanupHandlers.push(handler);
  return () => {
    const index = cleanupHandlers.indexOf(handler);
    if (index >= 0) {
      cleanupHandlers.splice(index, 1);
    }
  };
}

/**
 * Run every registered handler once. A failing handler does not stop the
 * others.
 */
export async function runCleanup(): Promise<void> {
  if (isShuttingDown) {
    return;
  }

  isShuttingDown = true;

  for (const handler of cleanupHandlers) {
    try {
      await handler();
    } catch (error) {
      logger.debug('Cleanup error:', error);
    }
  }
}

/**
 * Setup graceful shutdown handlers
 */
export function setupShutdownHandlers(): void {
  // Handle Ctrl+C
  process.on('SIGINT', () => {
    console.error(chalk.yellow('\nInterrupted'));
    void runCleanup().finally(() => process.exit(130));
  });

  // Handle termination
  process.on('SIGTERM', () => {
    void runCleanup().finally(() => process.exit(143));
  });
}

/**
 * Check if shutting down
 */
export function isShuttingDownFlag(): boolean {
  return isShuttingDown;
}

/**
 * Clear all shutdown handlers and reset state (for tests)
 */
export function clearShutdownHandlers(): void {
  cleanupHandlers.length = 0;
  isShuttingDown = false;
}
