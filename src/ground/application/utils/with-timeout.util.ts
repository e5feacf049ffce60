import { TimeoutError } from '../../domain/errors/reservation.errors';

/**
 * Rejects with a TimeoutError when the operation has not settled within
 * `timeoutMs`. The operation itself keeps running; only the wait is bounded.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(label, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
