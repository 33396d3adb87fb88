/**
 * Deadline enforcement for outbound calls
 */

import { TimeoutError } from './errors.js';

/** Longest delay setTimeout honours; larger values fire at once */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Run an abortable operation with a deadline.
 * On expiry the signal handed to the operation is aborted and the
 * returned promise rejects with TimeoutError.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const delay = Math.min(timeoutMs, MAX_TIMEOUT_MS);
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the race settles with the timeout, not the abort
      reject(new TimeoutError(`${label} timed out after ${delay}ms`));
      controller.abort();
    }, delay);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
