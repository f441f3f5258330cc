import { fromAsyncIterable } from 'universe/source';

/**
 * Returns a source yielding each of `chunks` in turn, one per pull.
 */
export function sourceOf(...chunks: (string | Uint8Array)[]) {
  return fromAsyncIterable(
    (async function* () {
      for (const chunk of chunks) {
        yield chunk;
      }
    })()
  );
}

/**
 * Splits the UTF-8 encoding of `text` into chunks of at most `size` bytes.
 */
export function splitEvery(text: string, size: number): Buffer[] {
  const bytes = Buffer.from(text);
  const chunks: Buffer[] = [];

  for (let offset = 0; offset < bytes.length; offset += size) {
    chunks.push(bytes.subarray(offset, offset + size));
  }

  return chunks;
}

/**
 * Splits the UTF-8 encoding of `text` into two chunks at byte `offset`.
 */
export function splitAt(text: string, offset: number): Buffer[] {
  const bytes = Buffer.from(text);
  return [bytes.subarray(0, offset), bytes.subarray(offset)];
}

/**
 * Collects everything `iterable` yields until it ends or throws.
 */
export async function collectUntilError<T>(iterable: AsyncIterable<T>) {
  const values: T[] = [];

  try {
    for await (const value of iterable) {
      values.push(value);
    }
  } catch (error) {
    return { values, error };
  }

  return { values, error: undefined };
}

/**
 * Resolves after pending I/O callbacks and microtasks have run.
 */
export function flushPromises() {
  return new Promise<void>((resolve) => setImmediate(resolve));
}
