import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout } from './timeout.js';
import { TimeoutError } from './errors.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the result when it finishes in time', async () => {
    await expect(withTimeout('Converting a.md', 1000, async () => 'done')).resolves.toBe('done');
  });

  it('should reject and abort the signal when the deadline passes', async () => {
    vi.useFakeTimers();
    const seen: { signal?: AbortSignal } = {};
    const pending = withTimeout('Uploading a.docx', 50, signal => {
      seen.signal = signal;
      return new Promise<never>(() => {});
    });
    const assertion = expect(pending).rejects.toThrow('Uploading a.docx timed out after 50ms');

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    expect(seen.signal?.aborted).toBe(true);
  });

  it('should report the timeout even when the aborted call rejects on its own', async () => {
    vi.useFakeTimers();
    const pending = withTimeout('Converting b.md', 50, signal => new Promise<never>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(new Error('pandoc killed')), { once: true });
    }));
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('should run without a deadline when the timeout is zero', async () => {
    const fn = vi.fn(async (signal: AbortSignal) => signal.aborted);
    await expect(withTimeout('Listing', 0, fn)).resolves.toBe(false);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should pass through errors from the wrapped call', async () => {
    await expect(withTimeout('Listing', 1000, async () => {
      throw new Error('connection refused');
    })).rejects.toThrow('connection refused');
  });
});
