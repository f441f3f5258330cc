import debugFactory from 'debug';

import { CancelledError, throwIfCancelled } from './error';

const debug = debugFactory('json-array-streamer:source');
const minimumStoreSize = 4096;

/**
 * An ordered sequence of byte segments handed out by a {@link ChunkSource}.
 */
export class ByteSequence {
  readonly length: number;

  constructor(readonly segments: readonly Uint8Array[]) {
    this.length = segments.reduce((sum, segment) => sum + segment.length, 0);
  }

  get isEmpty() {
    return this.length === 0;
  }

  /**
   * Returns the sequence as one contiguous array, copying only when there is
   * more than one segment.
   */
  toUint8Array(): Uint8Array {
    if (this.segments.length === 1) {
      return this.segments[0];
    }

    return Buffer.concat(this.segments, this.length);
  }
}

/**
 * The result of {@link ChunkSource.read}.
 */
export type ChunkReadResult = {
  /**
   * Every byte not yet consumed. Only valid until the matching
   * {@link ChunkSource.advanceTo}.
   */
  buffer: ByteSequence;
  /**
   * `true` if the source will never produce more bytes.
   */
  isCompleted: boolean;
  /**
   * `true` if the read was released early by a request to cancel the pending
   * read rather than by new data.
   */
  isCanceled: boolean;
};

/**
 * A pull-based source of bytes with explicit acknowledgement of what was used.
 *
 * Each `read` must be followed by exactly one `advanceTo` before the next
 * `read`. Bytes before `consumed` are never delivered again; bytes from
 * `consumed` up to `examined` are delivered again, but the next `read` waits
 * until something arrives beyond them.
 */
export interface ChunkSource {
  read(signal?: AbortSignal): Promise<ChunkReadResult>;
  /**
   * @param examined Defaults to `consumed`.
   */
  advanceTo(consumed: number, examined?: number): void;
}

/**
 * A promise that can be settled from outside, recreated after every change.
 */
class ChangeNotifier {
  protected pending: { promise: Promise<void>; resolve: () => void } | undefined;

  wait(): Promise<void> {
    if (!this.pending) {
      let resolve: () => void = () => undefined;
      const promise = new Promise<void>((resolver) => (resolve = resolver));
      this.pending = { promise, resolve };
    }

    return this.pending.promise;
  }

  notify() {
    const pending = this.pending;
    this.pending = undefined;
    pending?.resolve();
  }
}

/**
 * Returns a promise that settles like `promise` unless `signal` fires first,
 * in which case it rejects with a {@link CancelledError}. `promise` itself is
 * left untouched.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancelledError(signal));
      return;
    }

    const onAbort = () => reject(new CancelledError(signal));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * A {@link ChunkSource} that keeps unconsumed bytes in memory. Subclasses feed
 * it through `append` and `finish`.
 */
export abstract class BufferedChunkSource implements ChunkSource {
  // ? Unconsumed bytes live in store[start, start + length)
  protected store = Buffer.alloc(0);
  protected start = 0;
  protected length = 0;
  protected examined = 0;
  protected lastReadLength = 0;
  protected reading = false;
  protected completed = false;
  protected cancelRequested = false;
  protected fault: { error: unknown } | undefined = undefined;
  protected readonly changed = new ChangeNotifier();

  async read(signal?: AbortSignal): Promise<ChunkReadResult> {
    if (this.reading) {
      throw new Error('read was called again before advanceTo');
    }

    throwIfCancelled(signal);
    this.reading = true;

    try {
      while (this.length <= this.examined && !this.completed && !this.cancelRequested) {
        await this.waitForData(signal);
      }
    } catch (error) {
      this.reading = false;
      throw error;
    }

    // ? Buffered bytes are delivered before a fault surfaces
    if (this.fault && this.length <= this.examined) {
      this.reading = false;
      throw this.fault.error;
    }

    const isCanceled = this.cancelRequested;
    this.cancelRequested = false;
    this.lastReadLength = this.length;

    return {
      buffer: new ByteSequence(
        this.length === 0 ? [] : [this.store.subarray(this.start, this.start + this.length)]
      ),
      isCompleted: this.completed && !this.fault,
      isCanceled
    };
  }

  advanceTo(consumed: number, examined = consumed): void {
    if (!this.reading) {
      throw new Error('advanceTo was called without a preceding read');
    }

    if (
      !Number.isInteger(consumed) ||
      !Number.isInteger(examined) ||
      consumed < 0 ||
      consumed > examined ||
      examined > this.lastReadLength
    ) {
      throw new RangeError(
        `expected 0 <= consumed (${consumed}) <= examined (${examined}) <= ${this.lastReadLength}`
      );
    }

    this.discard(consumed);
    this.examined = examined - consumed;
    this.reading = false;
    this.onAdvance();
  }

  /**
   * Suspends until something changes. Rejects with a {@link CancelledError} if
   * `signal` fires first.
   */
  protected waitForData(signal?: AbortSignal): Promise<void> {
    return abortable(this.changed.wait(), signal);
  }

  /**
   * Called after every `advanceTo`.
   */
  protected onAdvance(): void {
    // ? Nothing to do by default
  }

  /**
   * Copies `chunk` after the unconsumed bytes.
   */
  protected append(chunk: Uint8Array) {
    if (chunk.length > 0) {
      this.reserve(chunk.length);
      this.store.set(chunk, this.start + this.length);
      this.length += chunk.length;
    }

    this.changed.notify();
  }

  /**
   * Makes room for `count` more bytes. Bytes already handed out by `read` are
   * never moved or overwritten before the matching `advanceTo`, so the store
   * is only ever replaced, never compacted in place.
   */
  protected reserve(count: number) {
    const needed = this.length + count;

    if (this.start + needed <= this.store.length) {
      return;
    }

    const store = Buffer.allocUnsafe(Math.max(needed * 2, minimumStoreSize));
    this.store.copy(store, 0, this.start, this.start + this.length);

    debug('reallocated store from %O to %O bytes', this.store.length, store.length);

    this.store = store;
    this.start = 0;
  }

  protected finish(error?: unknown) {
    if (this.completed) {
      return;
    }

    debug('source completed (faulted: %O)', error !== undefined);

    this.completed = true;
    this.fault = error === undefined ? undefined : { error };
    this.changed.notify();
  }

  protected discard(count: number) {
    this.start += count;
    this.length -= count;

    if (this.length === 0) {
      this.start = 0;
    }
  }
}

/**
 * Options used to configure a pipe created by {@link createPipe}.
 */
export type PipeOptions = {
  /**
   * The number of unconsumed bytes above which `write` waits for the reader.
   *
   * @default 65536
   */
  highWaterMark?: number;
};

/**
 * The writing end of a pipe.
 */
export type PipeWriter = {
  /**
   * Copies `chunk` into the pipe. Resolves once unconsumed bytes are at or
   * below the high water mark, to `false` if the reader has completed and no
   * longer wants bytes, and to `true` otherwise.
   */
  write(chunk: Uint8Array | string): Promise<boolean>;
  /**
   * Signals that no more bytes will be written. If `error` is given, the
   * reader throws it unchanged once buffered bytes are used up.
   */
  complete(error?: unknown): void;
};

/**
 * The reading end of a pipe.
 */
export class PipeReader extends BufferedChunkSource {
  protected readonly highWaterMark: number;
  protected readerCompleted = false;
  protected readonly writable = new ChangeNotifier();

  /**
   * The writing end of this pipe.
   */
  readonly writer: PipeWriter;

  constructor({ highWaterMark = 65536 }: PipeOptions = {}) {
    super();

    if (!Number.isInteger(highWaterMark) || highWaterMark < 0) {
      throw new RangeError(
        `highWaterMark must be a non-negative integer, saw: ${highWaterMark}`
      );
    }

    this.highWaterMark = highWaterMark;
    this.writer = {
      write: (chunk) => this.write(chunk),
      complete: (error) => this.finish(error)
    };
  }

  /**
   * Releases a pending or the next `read` with `isCanceled` set.
   */
  cancelPendingRead() {
    this.cancelRequested = true;
    this.changed.notify();
  }

  /**
   * Signals that no more bytes will be read. Pending and future writes
   * resolve to `false`.
   */
  complete() {
    this.readerCompleted = true;
    this.store = Buffer.alloc(0);
    this.start = 0;
    this.length = 0;
    this.examined = 0;
    this.writable.notify();
  }

  protected override onAdvance() {
    this.writable.notify();
  }

  protected async write(chunk: Uint8Array | string): Promise<boolean> {
    if (this.completed) {
      throw new Error('cannot write to a pipe after it was completed');
    }

    if (this.readerCompleted) {
      return false;
    }

    this.append(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);

    while (!this.readerCompleted && this.length > this.highWaterMark) {
      await this.writable.wait();
    }

    return !this.readerCompleted;
  }
}

/**
 * Creates an in-memory pipe whose reading end is a {@link ChunkSource}.
 */
export function createPipe(options?: PipeOptions) {
  const reader = new PipeReader(options);
  return { reader, writer: reader.writer };
}

type SettledNext =
  | { result: IteratorResult<Uint8Array | string> }
  | { error: unknown };

/**
 * A {@link ChunkSource} pulling from an async iterable, such as a Node.js
 * `Readable`. The next chunk is only requested once every buffered byte has
 * been examined.
 */
export class IterableChunkSource extends BufferedChunkSource {
  protected readonly iterator: AsyncIterator<Uint8Array | string>;
  // ? Survives a cancelled wait so no chunk is ever lost
  protected pending: Promise<SettledNext> | undefined = undefined;

  constructor(iterable: AsyncIterable<Uint8Array | string>) {
    super();
    this.iterator = iterable[Symbol.asyncIterator]();
  }

  protected override async waitForData(signal?: AbortSignal): Promise<void> {
    this.pending ??= this.iterator.next().then(
      (result) => ({ result }),
      (error: unknown) => ({ error })
    );

    const settled = await abortable(this.pending, signal);
    this.pending = undefined;

    if ('error' in settled) {
      this.finish(settled.error);
    } else if (settled.result.done) {
      this.finish();
    } else {
      const { value } = settled.result;
      this.append(typeof value === 'string' ? Buffer.from(value, 'utf8') : value);
    }
  }
}

/**
 * Adapts an async iterable of byte or string chunks into a {@link ChunkSource}.
 */
export function fromAsyncIterable(iterable: AsyncIterable<Uint8Array | string>) {
  return new IterableChunkSource(iterable);
}
