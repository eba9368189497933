import { logger } from './utils/logger';

export const ABORT_SIGNALS = ['SIGHUP', 'SIGTERM', 'SIGINT'] as const;

/**
 * Map hangup and termination signals onto `controller`. Handlers stay
 * installed after the first signal so a repeat cannot fall through to the
 * default action and kill the process while temp files are being removed.
 * Returns a function that uninstalls them.
 */
export function abortOnSignals(controller: AbortController): () => void {
  const handlers = ABORT_SIGNALS.map((signal) => {
    const handler = (): void => {
      if (controller.signal.aborted) {
        logger.debug({ signal }, 'Session already aborting, ignoring signal');
        return;
      }
      logger.info({ signal }, 'Received signal, aborting session');
      controller.abort();
    };
    process.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      process.off(signal, handler);
    }
  };
}
