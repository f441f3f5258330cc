import assert from 'node:assert';
import Assembler, { type AssemblerOptions } from 'stream-json/Assembler';

import type { JsonToken } from '../types/global';
import type { JsonValue } from 'type-fest';

/**
 * Assembles exactly one JSON value out of a sequence of packed
 * {@link JsonToken}s using stream-json's {@link Assembler}.
 *
 * The tokens must describe a single, complete value; anything less is an
 * assertion failure since callers are expected to have found the value's
 * boundaries beforehand.
 *
 * See https://github.com/uhop/stream-json/wiki/Assembler for details.
 */
export function assembleValue(
  tokens: Iterable<JsonToken>,
  options?: AssemblerOptions
): JsonValue {
  const assembler = new Assembler(options);
  let sawToken = false;

  for (const token of tokens) {
    assert(
      !sawToken || !assembler.done,
      'tokens continue past the end of the assembled value'
    );

    assembler.consume(toAssemblerToken(token));
    sawToken = true;
  }

  assert(sawToken, 'cannot assemble a value out of zero tokens');
  assert(assembler.done, 'tokens ended before the value was fully assembled');

  return assembler.current;
}

/**
 * Narrows a {@link JsonToken} to what `Assembler#consume` accepts. Literal
 * tokens carry no string value; the assembler derives it from their name.
 */
function toAssemblerToken(token: JsonToken): { name: string; value?: string } {
  return typeof token.value === 'string'
    ? { name: token.name, value: token.value }
    : { name: token.name };
}
