import { BufferPool } from '../../lib/buffer-pool';
import { DecodeError } from '../error';

import type { JsonValue } from 'type-fest';
import type { DeclaredType, TypeToken } from '../../types/global';
import type { TokenCursor, TokenSpan } from './span';

/**
 * Per-stream settings every decoder sees.
 */
export type DecodeContext = {
  /**
   * If `false`, a property name that matches no field exactly is matched
   * again ignoring case.
   */
  caseSensitive: boolean;
};

/**
 * Turns the tokens of one array element into a value of type `T`. Each
 * decoder owns the pool its output buffers are borrowed from.
 */
export interface ElementDecoder<T> {
  readonly pool: BufferPool<T>;
  decode(span: TokenSpan, context: DecodeContext): T;
}

export type PlanReader<T> = (cursor: TokenCursor, context: DecodeContext) => T;

/**
 * A precompiled reader bound to a declared type. Plans compose: a plan reads
 * exactly one value from a cursor, so it can be used as the element, field or
 * item reader of another plan.
 */
export class DecodePlan<T> implements ElementDecoder<T> {
  readonly pool = new BufferPool<T>();

  constructor(
    readonly type: DeclaredType<T>,
    protected readonly reader: PlanReader<T>
  ) {}

  /**
   * Reads one value, leaving the cursor just past it.
   */
  read(cursor: TokenCursor, context: DecodeContext): T {
    return this.reader(cursor, context);
  }

  decode(span: TokenSpan, context: DecodeContext): T {
    const cursor = span.cursor();
    const value = this.read(cursor, context);
    const extra = cursor.peek();

    if (extra) {
      throw cursor.mismatch('the end of the element', extra);
    }

    return value;
  }
}

/**
 * Returns a new {@link TypeToken} standing in for `T`.
 */
export function declareType<T>(name: string): TypeToken<T> {
  return { name };
}

/**
 * Declared types of the built-in plans.
 */
export const Types = {
  string: declareType<string>('string'),
  number: declareType<number>('number'),
  integer: declareType<number>('integer'),
  boolean: declareType<boolean>('boolean'),
  json: declareType<JsonValue>('json')
} as const;

export const stringPlan = new DecodePlan(Types.string, (cursor) => cursor.readString());

export const numberPlan = new DecodePlan(Types.number, (cursor) =>
  Number(cursor.readNumberText())
);

/**
 * Accepts only numbers written without a fraction or exponent that fit in a
 * safe integer.
 */
export const integerPlan = new DecodePlan(Types.integer, (cursor) => {
  const token = cursor.expect('numberValue');
  const text = cursor.span.textOf(token);

  if (/[.eE]/.test(text)) {
    throw new DecodeError(
      `expected an integer but saw ${text}`,
      cursor.span.positionOf(token)
    );
  }

  const value = Number(text);

  if (!Number.isSafeInteger(value)) {
    throw new DecodeError(
      `integer ${text} is out of range`,
      cursor.span.positionOf(token)
    );
  }

  return value;
});

export const booleanPlan = new DecodePlan(Types.boolean, (cursor) => cursor.readBoolean());

/**
 * Accepts any JSON value as is.
 */
export const jsonPlan = new DecodePlan(Types.json, (cursor) => cursor.readJsonValue());

function nameOf(type: DeclaredType<unknown>) {
  return type.name || 'anonymous';
}

/**
 * Returns a plan reading a JSON array whose items are read by `item`.
 */
export function arrayPlan<T>(item: DecodePlan<T>): DecodePlan<T[]> {
  return new DecodePlan(declareType<T[]>(`${nameOf(item.type)}[]`), (cursor, context) => {
    const items: T[] = [];

    cursor.expect('startArray');

    while (cursor.peek()?.name !== 'endArray') {
      items.push(item.read(cursor, context));
    }

    cursor.expect('endArray');
    return items;
  });
}

/**
 * Returns a plan that also accepts JSON `null`.
 */
export function nullablePlan<T>(plan: DecodePlan<T>): DecodePlan<T | null> {
  return new DecodePlan(
    declareType<T | null>(`${nameOf(plan.type)}?`),
    (cursor, context) => {
      if (cursor.peek()?.name === 'nullValue') {
        cursor.next();
        return null;
      }

      return plan.read(cursor, context);
    }
  );
}

/**
 * Reads the value of one property into an object under construction.
 */
export type FieldPlan<T> = {
  read(cursor: TokenCursor, context: DecodeContext, target: T): void;
};

/**
 * Returns a {@link FieldPlan} reading a value with `plan` and storing it with
 * `assign`.
 */
export function field<T, V>(
  plan: DecodePlan<V>,
  assign: (target: T, value: V) => void
): FieldPlan<T> {
  return {
    read(cursor, context, target) {
      assign(target, plan.read(cursor, context));
    }
  };
}

/**
 * Returns a plan reading a JSON object into the value returned by `create`.
 * Properties are looked up in `fields` by exact name first and, unless the
 * stream is case-sensitive, by lowercased name second. Properties without a
 * field are skipped.
 */
export function objectPlan<T>(
  type: DeclaredType<T>,
  { create, fields }: { create: () => T; fields: Record<string, FieldPlan<T>> }
): DecodePlan<T> {
  const exact = new Map(Object.entries(fields));
  const folded = new Map<string, FieldPlan<T>>();

  for (const [name, fieldPlan] of exact) {
    const lowercased = name.toLowerCase();

    if (!folded.has(lowercased)) {
      folded.set(lowercased, fieldPlan);
    }
  }

  return new DecodePlan(type, (cursor, context) => {
    const target = create();

    cursor.expect('startObject');

    for (;;) {
      const token = cursor.next();

      if (token.name === 'endObject') {
        return target;
      }

      if (token.name !== 'keyValue') {
        throw cursor.mismatch('a property name', token);
      }

      const key = cursor.span.stringOf(token);
      const fieldPlan =
        exact.get(key) ??
        (context.caseSensitive ? undefined : folded.get(key.toLowerCase()));

      if (fieldPlan) {
        fieldPlan.read(cursor, context, target);
      } else {
        cursor.skipValue();
      }
    }
  });
}
