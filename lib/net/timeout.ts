/** Largest delay `setTimeout` honours; anything above is clamped to 1ms by Node. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Raised by `withTimeout` when the wrapped promise does not settle in time.
 */
export class TimeoutError extends Error {
  constructor(ms: number) {
    super(`timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Shared timeout helper for promises. `onTimeout` runs once the deadline passes,
 * before the returned promise rejects, so callers can release the underlying resource.
 */
export function withTimeout<T>(p: Promise<T>, ms: number, onTimeout?: () => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(ms));
    }, ms);
    p.then(
      (v) => { clearTimeout(t); resolve(v); },
      (e) => { clearTimeout(t); reject(e); },
    );
  });
}
