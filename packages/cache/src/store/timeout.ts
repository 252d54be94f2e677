import { TimeoutError } from '@embedcache/shared';

/**
 * Settles with `operation`, or rejects with TimeoutError once `timeoutMs`
 * elapses first. The operation keeps running; its late result is dropped.
 */
export function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timeoutTimer = setTimeout(() => {
      if (!settled) {
        settled = true;
        reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, { timeoutMs }));
      }
    }, timeoutMs);

    operation.then(
      (value) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        reject(error);
      },
    );
  });
}
