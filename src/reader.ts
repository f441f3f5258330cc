import debugFactory from 'debug';

import {
  ResumableTokenizer,
  createTokenizerState,
  type TokenizerOptions
} from '../lib/resumable-tokenizer';

import {
  useDepthTracking,
  type PositionedToken
} from '../lib/stream-json-extended';

import { selectDecoder, TokenSpan } from './decode';
import { throwIfCancelled } from './error';

import type { JsonValue } from 'type-fest';
import type { DeclaredType } from '../types/global';
import type { DecodePlan, DecoderRegistry, ElementDecoder } from './decode';
import type { ChunkSource } from './source';

const debug = debugFactory('json-array-streamer:reader');

/**
 * Options used to configure {@link readJsonArray}.
 */
export type ReadJsonArrayOptions = {
  /**
   * The number of decoded elements the output buffer holds before it has to
   * grow. Rounded up to a power of two.
   *
   * @default 32
   */
  initialBufferCapacity?: number;
  /**
   * If `true`, property names must match field names exactly.
   *
   * @default false
   */
  caseSensitive?: boolean;
  /**
   * Options passed to the tokenizer.
   */
  tokenizer?: TokenizerOptions;
  /**
   * Where to look up the plan for `type`.
   */
  registry?: DecoderRegistry;
  /**
   * Aborts the stream the next time it waits for bytes.
   */
  signal?: AbortSignal;
};

/**
 * Decodes each element of the first JSON array found in `source` as soon as
 * the element's last byte has arrived. Elements are decoded into plain JSON
 * values.
 */
export function readJsonArray(
  source: ChunkSource,
  options?: ReadJsonArrayOptions & { plan?: undefined; type?: undefined }
): AsyncGenerator<JsonValue, void, undefined>;
/**
 * Decodes each element of the first JSON array found in `source` as soon as
 * the element's last byte has arrived. Elements are decoded with `plan` if
 * given, else with the plan `registry` holds for `type`, else reflectively
 * when `type` is a class.
 */
export function readJsonArray<T>(
  source: ChunkSource,
  options: ReadJsonArrayOptions &
    (
      | { plan: DecodePlan<T>; type?: DeclaredType<T> }
      | { plan?: undefined; type: DeclaredType<T> }
    )
): AsyncGenerator<T, void, undefined>;
export function readJsonArray<T>(
  source: ChunkSource,
  {
    plan,
    type,
    ...options
  }: ReadJsonArrayOptions & { plan?: DecodePlan<T>; type?: DeclaredType<T> } = {}
): AsyncGenerator<T, void, undefined> {
  // ? Selecting eagerly surfaces setup mistakes at the call site
  const decoder = selectDecoder({ plan, type, registry: options.registry });
  return readElements(source, decoder, options);
}

/**
 * The array-streaming loop behind {@link readJsonArray}, for callers that
 * already have a decoder.
 */
export async function* readElements<T>(
  source: ChunkSource,
  decoder: ElementDecoder<T>,
  {
    initialBufferCapacity = 32,
    caseSensitive = false,
    tokenizer: tokenizerOptions,
    signal
  }: ReadJsonArrayOptions = {}
): AsyncGenerator<T, void, undefined> {
  const context = { caseSensitive };
  const { pool } = decoder;

  let buffer = pool.acquire(initialBufferCapacity);
  let state = createTokenizerState(tokenizerOptions);
  let insideArray = false;
  // ? Absolute offset of the first byte of the current read
  let streamOffset = 0;
  let cycle = 0;

  try {
    for (;;) {
      throwIfCancelled(signal);

      const { buffer: sequence, isCompleted, isCanceled } = await source.read(signal);
      cycle += 1;

      // ? An exhausted source between top-level values simply ends the stream
      if (sequence.isEmpty && isCompleted && state.containers.length === 0) {
        source.advanceTo(0);
        debug('cycle %O: source exhausted', cycle);
        return;
      }

      const bytes = sequence.toUint8Array();
      const tokenizer = new ResumableTokenizer(bytes, {
        isFinalSpan: isCompleted,
        // ? Input holding no value at all is an array with no elements
        allowEmptyDocument: true,
        state,
        baseOffset: streamOffset
      });

      let consumed = 0;
      let done = false;
      let fault: { error: unknown } | undefined = undefined;

      const markConsumed = () => {
        consumed = tokenizer.position;
        state = tokenizer.currentState;
      };

      try {
        for (;;) {
          if (!tokenizer.read()) {
            // ? Trailing whitespace and comments need not be scanned again
            markConsumed();
            break;
          }

          const token = tokenizer.token;

          if (!insideArray || token.name === 'comment') {
            insideArray ||= token.name === 'startArray';
            markConsumed();
            continue;
          }

          if (token.name === 'endArray') {
            done = true;
            markConsumed();
            break;
          }

          const span = collectElement(tokenizer, bytes, streamOffset);

          if (!span) {
            // ? The rest of this element has yet to arrive
            break;
          }

          if (buffer.isFull) {
            buffer = pool.grow(buffer);
          }

          buffer.items.push(decoder.decode(span, context));
          markConsumed();
        }
      } catch (error) {
        fault = { error };
      }

      source.advanceTo(consumed, done ? consumed : bytes.length);
      streamOffset += consumed;

      debug(
        'cycle %O: %O/%O bytes consumed, %O elements decoded%s%s',
        cycle,
        consumed,
        bytes.length,
        buffer.items.length,
        isCanceled ? ' (read canceled)' : '',
        fault ? ' before a fault' : ''
      );

      for (const item of buffer.items) {
        yield item;
      }

      buffer.clear();

      if (fault) {
        throw fault.error;
      }

      if (done || isCompleted) {
        return;
      }
    }
  } finally {
    pool.release(buffer);
  }
}

/**
 * Reads the rest of the element starting with the tokenizer's current token.
 * Returns `undefined` if the span ends before the element does.
 */
function collectElement(
  tokenizer: ResumableTokenizer,
  bytes: Uint8Array,
  baseOffset: number
): TokenSpan | undefined {
  const { isValueComplete, updateDepth } = useDepthTracking();
  const tokens: PositionedToken[] = [tokenizer.token];

  updateDepth(tokenizer.token);

  while (!isValueComplete()) {
    if (!tokenizer.read()) {
      return undefined;
    }

    tokens.push(tokenizer.token);
    updateDepth(tokenizer.token);
  }

  return new TokenSpan(bytes, tokens, baseOffset);
}
