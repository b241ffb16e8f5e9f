import { Logger } from './cli-helpers.js';

export interface Shutdown {
  /** Aborted on the first interrupt; pipelines stop between download chunks. */
  readonly signal: AbortSignal;
  handle(signalName: string): void;
}

/**
 * The first interrupt cancels running work and leaves `graceMs` for it to
 * unwind; a second one exits at once.
 */
export function createShutdown(exit: (code: number) => void, graceMs = 5000): Shutdown {
  const controller = new AbortController();
  return {
    signal: controller.signal,
    handle(signalName: string): void {
      if (controller.signal.aborted) {
        exit(130);
        return;
      }
      Logger.warn(`Received ${signalName}, cancelling (send it again to quit now)`);
      controller.abort(new Error(`${signalName} received`));
      setTimeout(() => {
        exit(130);
      }, graceMs).unref();
    },
  };
}

export const shutdown = createShutdown((code) => process.exit(code));
