import { EXIT_CODES } from '../constants/index.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

type Cleanup = () => Promise<void>;

const cleanups = new Set<Cleanup>();
let installed = false;

/**
 * Register work that must run if the process is interrupted (e.g. removing
 * an extracted archive). Returns a function that unregisters it.
 */
export function registerCleanup(cleanup: Cleanup): () => void {
  cleanups.add(cleanup);
  return () => {
    cleanups.delete(cleanup);
  };
}

export async function runCleanups(): Promise<void> {
  const pending = [...cleanups];
  cleanups.clear();
  for (const cleanup of pending) {
    try {
      await cleanup();
    } catch (error) {
      logger.error('Cleanup after interrupt failed', { error: errorMessage(error) });
    }
  }
}

/**
 * On SIGINT/SIGTERM: run registered cleanups, then exit with 130.
 */
export function installInterruptHandlers(): void {
  if (installed) {
    return;
  }
  installed = true;

  const onSignal = (signal: NodeJS.Signals) => {
    logger.debug(`Received ${signal}`);
    console.error('\n\nInterrupted by user');
    void runCleanups().finally(() => process.exit(EXIT_CODES.INTERRUPTED));
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}
