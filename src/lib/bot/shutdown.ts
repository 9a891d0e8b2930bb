import type { Logger } from './logger';

/**
 * Signal handler that runs `shutdown` once. Later signals are ignored; a
 * rejected shutdown is logged and ends the process with exit code 1.
 */
export function createSignalHandler(
  shutdown: (signal: string) => Promise<void>,
  logger: Logger,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: string) => void {
  let stopping = false;
  return (signal: string) => {
    if (stopping) return;
    stopping = true;
    shutdown(signal).catch((err: unknown) => {
      logger.error('shutdown failed', {
        signal,
        error: err instanceof Error ? err.message : String(err),
      });
      exit(1);
    });
  };
}
