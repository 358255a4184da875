/**
 * Signal handling. Nothing partial is flushed on interrupt: export state is
 * only written after its stream is complete, and pushes record each edit as
 * it lands.
 */

import { logger } from '../util/logger.js';

let installed = false;

export function setupInterruptHandler(exit: (code: number) => void = (code) => process.exit(code)): () => void {
  if (installed) {
    logger.debug('Interrupt handler already installed');
    return () => undefined;
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`Received ${signal}, aborting`);
    exit(130);
  };
  const onRejection = (reason: unknown): void => {
    logger.error('Unhandled promise rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined
    });
    exit(1);
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  process.on('unhandledRejection', onRejection);
  installed = true;

  return (): void => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    process.off('unhandledRejection', onRejection);
    installed = false;
  };
}
