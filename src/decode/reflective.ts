import { BufferPool } from '../../lib/buffer-pool';
import { DecodeError } from '../error';

import type { JsonObject, JsonValue } from 'type-fest';
import type { Constructor } from '../../types/global';
import type { DecodeContext, ElementDecoder } from './plan';
import type { TokenSpan } from './span';

/**
 * Type guard for JSON objects (as opposed to arrays and primitives).
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeJson(value: JsonValue) {
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return 'an array';
  }

  return typeof value === 'object' ? 'an object' : `a ${typeof value}`;
}

/**
 * Decodes elements by assembling each into a plain JSON value and copying it
 * onto a freshly constructed instance of `type`.
 *
 * The instance's initial property values double as the schema. A number,
 * boolean or string property only takes a value of the same type (strings
 * also take `null`), an array property takes an array or `null`, an object
 * property is filled in recursively or set to `null`, and a property that
 * starts out `null` or `undefined` takes anything. JSON properties the
 * instance does not have are ignored.
 */
export class ReflectiveDecoder<T> implements ElementDecoder<T> {
  readonly pool = new BufferPool<T>();

  constructor(readonly type: Constructor<T>) {}

  decode(span: TokenSpan, context: DecodeContext): T {
    const value = span.cursor().readJsonValue();
    const instance = new this.type();

    if (typeof instance !== 'object' || instance === null) {
      throw new Error(`constructing ${this.type.name} did not produce an object`);
    }

    populate(instance, value, this.type.name, span.position, context);
    return instance;
  }
}

function populate(
  target: object,
  value: JsonValue,
  name: string,
  position: number,
  context: DecodeContext
) {
  if (!isJsonObject(value)) {
    throw new DecodeError(
      `expected an object for ${name} but saw ${describeJson(value)}`,
      position
    );
  }

  const ownKeys = Object.keys(target);
  const foldedKeys = new Map<string, string>();

  if (!context.caseSensitive) {
    for (const key of ownKeys) {
      const folded = key.toLowerCase();

      if (!foldedKeys.has(folded)) {
        foldedKeys.set(folded, key);
      }
    }
  }

  for (const [jsonKey, jsonValue] of Object.entries(value)) {
    const key = ownKeys.includes(jsonKey)
      ? jsonKey
      : foldedKeys.get(jsonKey.toLowerCase());

    if (key === undefined || jsonValue === undefined) {
      continue;
    }

    const initial: unknown = Reflect.get(target, key);
    const path = `${name}.${key}`;

    Reflect.set(target, key, convert(initial, jsonValue, path, position, context));
  }
}

function convert(
  initial: unknown,
  value: JsonValue,
  path: string,
  position: number,
  context: DecodeContext
): unknown {
  const fail = (expected: string) =>
    new DecodeError(
      `expected ${expected} for ${path} but saw ${describeJson(value)}`,
      position
    );

  if (initial === undefined || initial === null) {
    return value;
  }

  switch (typeof initial) {
    case 'number':
    case 'boolean': {
      if (typeof value !== typeof initial) {
        throw fail(`a ${typeof initial}`);
      }

      return value;
    }

    case 'string': {
      if (typeof value !== 'string' && value !== null) {
        throw fail('a string');
      }

      return value;
    }

    case 'object': {
      if (value === null) {
        return null;
      }

      if (Array.isArray(initial)) {
        if (!Array.isArray(value)) {
          throw fail('an array');
        }

        return value;
      }

      populate(initial, value, path, position, context);
      return initial;
    }

    default: {
      return value;
    }
  }
}

const decoderCache = new WeakMap<Constructor<unknown>, ReflectiveDecoder<unknown>>();

function isDecoderFor<T>(
  decoder: ReflectiveDecoder<unknown> | undefined,
  type: Constructor<T>
): decoder is ReflectiveDecoder<T> {
  return decoder?.type === type;
}

/**
 * Returns the {@link ReflectiveDecoder} for `type`, creating it on first use.
 * The same decoder, and so the same buffer pool, is returned for every stream
 * of `type`.
 */
export function reflect<T>(type: Constructor<T>): ReflectiveDecoder<T> {
  const cached = decoderCache.get(type);

  if (isDecoderFor(cached, type)) {
    return cached;
  }

  const decoder = new ReflectiveDecoder(type);
  decoderCache.set(type, decoder);
  return decoder;
}
