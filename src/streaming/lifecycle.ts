import { describeError, TransportWriteError } from '../types/errors.js';

/**
 * Per-connection writer state. `completing` and `aborted` are terminal.
 */
export type WriterState = 'idle' | 'streaming' | 'completing' | 'aborted';

export interface StreamResult {
  /** `cancelled` when the client went away; not an error */
  outcome: 'completed' | 'cancelled';
  /** Frames written, excluding the terminal frame */
  written: number;
  /** Events the encoder had no frame for */
  skipped: number;
}

export const HALTED = Symbol('halted');

/**
 * Wait for the next item, or for `signal` to abort, whichever comes first.
 * A pending `next()` that settles after the halt is ignored.
 */
export function nextOrHalt<T>(
  iterator: AsyncIterator<T>,
  signal: AbortSignal
): Promise<IteratorResult<T> | typeof HALTED> {
  if (signal.aborted) return Promise.resolve(HALTED);

  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(HALTED);
    signal.addEventListener('abort', onAbort, { once: true });

    iterator.next().then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Forward an external abort into an internal controller.
 * Returns the detach function.
 */
export function linkAbort(source: AbortSignal | undefined, target: AbortController): () => void {
  if (!source) return () => undefined;
  if (source.aborted) {
    target.abort();
    return () => undefined;
  }
  const onAbort = (): void => target.abort();
  source.addEventListener('abort', onAbort, { once: true });
  return () => source.removeEventListener('abort', onAbort);
}

export function toTransportError(err: unknown): TransportWriteError {
  if (err instanceof TransportWriteError) return err;
  const message = describeError(err);
  return new TransportWriteError(`Client write failed: ${message}`, err);
}
