import { BrokerTimeoutError } from './errors';

/**
 * Wait for `ms` without blocking the event loop.
 *
 * Resolves `true` when the full interval elapsed and `false` as soon as any
 * of the given signals aborts.
 */
export function sleep(ms: number, ...signals: AbortSignal[]): Promise<boolean> {
  return new Promise((resolve) => {
    if (signals.some((signal) => signal.aborted)) {
      resolve(false);
      return;
    }

    const detach = (): void => {
      for (const signal of signals) {
        signal.removeEventListener('abort', onAbort);
      }
    };
    const onAbort = (): void => {
      clearTimeout(timer);
      detach();
      resolve(false);
    };
    const timer = setTimeout(() => {
      detach();
      resolve(true);
    }, ms);

    for (const signal of signals) {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

/**
 * Reject with {@link BrokerTimeoutError} if `work` does not settle within `timeoutMs`.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  operation: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new BrokerTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Split a comma-delimited setting, keeping empty entries so that a blank
 * broker list stays detectable.
 */
export function splitCommaList(value: string): string[] {
  return value.split(',').map((entry) => entry.trim());
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
