import type { BaseLogger } from 'pino';

/**
 * Translates one framework's lifecycle into capture calls.
 *
 * One implementation per integrated framework; the core never imports
 * framework code. Implementations must not throw into the host
 * framework — wrap calls with `captureSafely`.
 */
export interface CaptureAdapter<Unit> {
  captureStart(unit: Unit): void;
  captureSuccess(unit: Unit): void;
  captureError(unit: Unit, err: unknown): void;
}

/** Runs a capture call; failures are logged and never reach the host. */
export function captureSafely(
  log: Pick<BaseLogger, 'warn'>,
  context: Record<string, unknown>,
  action: () => void,
): void {
  try {
    action();
  } catch (err: unknown) {
    log.warn({ err, ...context }, 'Event capture failed');
  }
}
