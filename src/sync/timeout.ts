import { TimeoutError } from './errors.js';

/**
 * Run `fn` with an abort signal that fires after `timeoutMs`.
 * Rejects with TimeoutError when the deadline passes first. A non-positive or
 * infinite timeout disables the deadline.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return fn(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the race settles with the timeout, not
      // with whatever error the aborted operation raises.
      reject(new TimeoutError(label, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
