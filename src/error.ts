import { isNativeError } from 'node:util/types';

export { JsonSyntaxError } from '../lib/resumable-tokenizer';

/**
 * Thrown when well-formed JSON cannot be converted into the declared element
 * type.
 */
export class DecodeError extends Error {
  override name = 'DecodeError';

  constructor(
    message: string,
    /**
     * The absolute byte offset of the offending token within the stream.
     */
    readonly position: number
  ) {
    super(`${message} at byte offset ${position}`);
  }
}

/**
 * Thrown when a read is abandoned because its `AbortSignal` fired. The
 * signal's `reason` is available as `cause`.
 */
export class CancelledError extends Error {
  override name = 'CancelledError';

  constructor(signal: AbortSignal) {
    super('the operation was cancelled', { cause: signal.reason });
  }
}

/**
 * Throws a {@link CancelledError} if `signal` has already fired.
 */
export function throwIfCancelled(signal: AbortSignal | undefined) {
  if (signal?.aborted) {
    throw new CancelledError(signal);
  }
}

/**
 * Normalizes an unknown throwable into an `Error`.
 */
export function toError(error: unknown): Error {
  return isNativeError(error) ? error : new Error(String(error));
}
