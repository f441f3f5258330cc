import { Transform, type TransformCallback, type TransformOptions } from 'node:stream';

/**
 * The chunks accepted by {@link InflationStream.pushMany}.
 */
export type PushManyChunks<T = unknown> = Iterable<T> | AsyncIterable<T>;

/**
 * This type is the same as {@link TransformOptions} but with the `this`
 * binding of each user-supplied method replaced with {@link InflationStream}.
 */
export type InflationStreamOptions = Omit<
  TransformOptions,
  'transform' | 'flush' | 'destroy' | 'final' | 'construct' | 'read' | 'write' | 'writev'
> & {
  transform?: (
    this: InflationStream,
    chunk: unknown,
    encoding: BufferEncoding,
    callback: TransformCallback
  ) => void;
  flush?: (this: InflationStream, callback: TransformCallback) => void;
  destroy?: (
    this: InflationStream,
    error: Error | null,
    callback: (error?: Error | null) => void
  ) => void;
};

/**
 * A {@link Transform} with an additional `pushMany()` method that safely
 * handles backpressure when the internal `readable.readableBuffer` is full.
 * In addition, a `'flow'` event is emitted whenever the internal `_read()`
 * method is invoked, and it is on top of this event that `pushMany()` is
 * implemented.
 *
 * `InflationStream`s are useful when inflating chunks in an unbounded or
 * semi-bounded way with the assumption that, _from within a `'flow'` event
 * handler_, this stream never consumes (i.e. `this.read()`) chunks that it
 * itself pushed into its own internal `readable.readableBuffer`.
 *
 * The algorithm used here is preferable to the [clever `stream.once('data',
 * ...)` method](https://stackoverflow.com/a/73474849/1367414). This is because
 * said method can cause catastrophic heisenbugs when the stream is being
 * written into when it does not already have any `'data'` handlers attached.
 */
export class InflationStream extends Transform {
  protected readonly transformHandler: InflationStreamOptions['transform'];
  protected readonly flushHandler: InflationStreamOptions['flush'];
  protected readonly destroyHandler: InflationStreamOptions['destroy'];

  constructor({ transform, flush, destroy, ...options }: InflationStreamOptions = {}) {
    super(options);
    this.transformHandler = transform;
    this.flushHandler = flush;
    this.destroyHandler = destroy;
  }

  /**
   * Equivalent to `push()` called back to back while respecting backpressure
   * from the internal `readable.readableBuffer`.
   *
   * The returned promise resolves to `true` once every chunk has been pushed,
   * or to `false` if the stream was destroyed first, in which case `chunks`
   * is closed early.
   */
  async pushMany(chunks: PushManyChunks, encoding?: BufferEncoding): Promise<boolean> {
    for await (const chunk of chunks) {
      if (this.destroyed) {
        return false;
      }

      if (!this.push(chunk, Buffer.isBuffer(chunk) ? undefined : encoding)) {
        // ? Once _read is called, start pushing again
        await this.waitForFlow();
      }
    }

    return !this.destroyed;
  }

  override _transform(
    chunk: unknown,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    if (this.transformHandler) {
      this.transformHandler.call(this, chunk, encoding, callback);
    } else {
      callback(null, chunk);
    }
  }

  override _flush(callback: TransformCallback): void {
    if (this.flushHandler) {
      this.flushHandler.call(this, callback);
    } else {
      callback(null);
    }
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    if (this.destroyHandler) {
      this.destroyHandler.call(this, error, callback);
    } else {
      super._destroy(error, callback);
    }
  }

  override _read(size: number): void {
    const readableLength = this.readableLength;

    // ? This is the readable-side version of the writable-side's 'drain' event.
    this.emit('flow');

    // ? If nothing is pushed into readableBuffer, then allow the transform to
    // ? continue. Since every call to push triggers another call to _read, we
    // ? can count on the following condition becoming true eventually.
    if (this.readableLength <= readableLength) {
      super._read(size);
    }
  }

  protected waitForFlow() {
    return new Promise<void>((resolve) => {
      if (this.destroyed) {
        resolve();
        return;
      }

      const done = () => {
        this.off('flow', done);
        this.off('close', done);
        resolve();
      };

      this.on('flow', done);
      this.on('close', done);
    });
  }
}

/**
 * Returns an {@link InflationStream}: a `Transform` instance with a new
 * `pushMany()` method and `'flow'` event.
 */
export function createInflationStream(options?: InflationStreamOptions) {
  return new InflationStream(options);
}
