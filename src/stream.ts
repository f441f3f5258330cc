import { chain } from 'stream-chain';
import debugFactory from 'debug';

import { createInflationStream } from '../lib/create-inflation-stream';
import { selectDecoder } from './decode';
import { toError } from './error';
import { readElements, type ReadJsonArrayOptions } from './reader';
import { createPipe } from './source';

import type { Readable } from 'node:stream';
import type { JsonValue } from 'type-fest';
import type { DeclaredType } from '../types/global';
import type { DecodePlan } from './decode';

const debug = debugFactory('json-array-streamer:stream');

/**
 * One decoded array element as emitted by {@link createArrayStreamer}.
 */
export type ArrayEntry<T> = {
  /**
   * The index of the element within the array.
   */
  key: number;
  value: T;
};

/**
 * Options used to configure {@link createArrayStreamer}.
 */
export type ArrayStreamerOptions<T> = Omit<ReadJsonArrayOptions, 'signal'> & {
  plan?: DecodePlan<T>;
  type?: DeclaredType<T>;
  /**
   * The number of written bytes buffered before writes wait on the parser.
   *
   * @default 65536
   */
  byteHighWaterMark?: number;
};

/**
 * Returns a `Transform` stream that takes the bytes of a JSON array on its
 * writable side and emits `{ key, value }` {@link ArrayEntry} objects on its
 * readable side as soon as each element is complete.
 *
 * Destroying the stream stops parsing and releases the stream's output
 * buffer. Bytes written after the array has ended are ignored.
 */
export function createArrayStreamer<T = JsonValue>({
  plan,
  type,
  byteHighWaterMark,
  ...options
}: ArrayStreamerOptions<T> = {}) {
  const decoder = selectDecoder({ plan, type, registry: options.registry });
  const { reader, writer } = createPipe({ highWaterMark: byteHighWaterMark });
  const controller = new AbortController();

  const streamer = createInflationStream({
    writableObjectMode: false,
    readableObjectMode: true,
    transform(chunk, _encoding, callback) {
      if (!(typeof chunk === 'string' || chunk instanceof Uint8Array)) {
        callback(new TypeError('expected chunk to be a string, Buffer, or Uint8Array'));
        return;
      }

      void writer.write(chunk).then(
        () => callback(null),
        (error: unknown) => callback(toError(error))
      );
    },
    flush(callback) {
      writer.complete();
      void pumped.then(() => callback(null));
    },
    destroy(error, callback) {
      controller.abort(error ?? undefined);
      reader.complete();
      callback(error);
    }
  });

  const pumped = pump();

  return streamer;

  async function pump() {
    let key = 0;

    async function* entries() {
      for await (const value of readElements(reader, decoder, {
        ...options,
        signal: controller.signal
      })) {
        const entry: ArrayEntry<T> = { key: key++, value };
        yield entry;
      }
    }

    try {
      await streamer.pushMany(entries());
      debug('pushed %O entries', key);
    } catch (error) {
      if (!controller.signal.aborted) {
        debug('parsing failed after %O entries', key);
        streamer.destroy(toError(error));
      }
    } finally {
      // ? Nothing reads from the pipe anymore; let pending writes through
      reader.complete();
    }
  }
}

/**
 * Pipes `input` into a new {@link createArrayStreamer} stream using
 * stream-chain.
 */
export function pipeJsonArray<T = JsonValue>(
  input: Readable,
  options?: ArrayStreamerOptions<T>
) {
  return chain([input, createArrayStreamer<T>(options)]);
}
