import { jsonPlan, type ElementDecoder } from './plan';
import { reflect } from './reflective';

import type { JsonValue } from 'type-fest';
import type { DeclaredType } from '../../types/global';
import type { DecodePlan } from './plan';
import type { DecoderRegistry } from './registry';

export * from './plan';
export * from './reflective';
export * from './registry';
export * from './span';

/**
 * Decodes elements into plain JSON values.
 */
export const jsonDecoder: ElementDecoder<JsonValue> = jsonPlan;

/**
 * Picks the decoder for one stream: an explicit `plan`, else the plan
 * `registry` holds for `type`, else a reflective decoder when `type` is a
 * class. A `type` that is only a type token must have a plan. With neither
 * `plan` nor `type`, elements are decoded into plain JSON values.
 */
export function selectDecoder(options: {
  plan?: undefined;
  type?: undefined;
  registry?: DecoderRegistry;
}): ElementDecoder<JsonValue>;
export function selectDecoder<T>(options: {
  plan?: DecodePlan<T>;
  type?: DeclaredType<T>;
  registry?: DecoderRegistry;
}): ElementDecoder<T>;
export function selectDecoder<T>({
  plan,
  type,
  registry
}: {
  plan?: DecodePlan<T>;
  type?: DeclaredType<T>;
  registry?: DecoderRegistry;
}): ElementDecoder<T> | ElementDecoder<JsonValue> {
  if (plan) {
    return plan;
  }

  if (type === undefined) {
    return jsonDecoder;
  }

  const registered = registry?.lookup(type);

  if (registered) {
    return registered;
  }

  if (typeof type === 'function') {
    return reflect(type);
  }

  throw new Error(
    `no decode plan is registered for type "${type.name}"; register one or pass a plan`
  );
}
