import {
  decodeStringToken,
  decodeTokenText,
  toJsonToken
} from '../../lib/resumable-tokenizer';

import {
  assembleValue,
  useDepthTracking,
  type JsonToken,
  type PositionedToken,
  type PositionedTokenName
} from '../../lib/stream-json-extended';

import { DecodeError } from '../error';

import type { JsonValue } from 'type-fest';

const tokenDescriptions: Record<PositionedTokenName, string> = {
  startObject: 'an object',
  endObject: 'the end of an object',
  startArray: 'an array',
  endArray: 'the end of an array',
  keyValue: 'a property name',
  stringValue: 'a string',
  numberValue: 'a number',
  trueValue: 'a boolean',
  falseValue: 'a boolean',
  nullValue: 'null',
  comment: 'a comment'
};

/**
 * The tokens of exactly one complete array element along with the bytes they
 * were scanned from.
 */
export class TokenSpan {
  constructor(
    readonly bytes: Uint8Array,
    readonly tokens: readonly PositionedToken[],
    /**
     * The absolute stream offset of `bytes[0]`.
     */
    readonly baseOffset: number
  ) {}

  /**
   * The absolute stream offset at which the element starts.
   */
  get position() {
    return this.baseOffset + (this.tokens.at(0)?.start ?? 0);
  }

  positionOf(token: PositionedToken) {
    return this.baseOffset + token.start;
  }

  stringOf(token: PositionedToken) {
    return decodeStringToken(this.bytes, token, this.baseOffset);
  }

  textOf(token: PositionedToken) {
    return decodeTokenText(this.bytes, token, this.baseOffset);
  }

  /**
   * Converts `tokens[from]` through `tokens[to - 1]` into stream-json tokens,
   * leaving out comments.
   */
  toJsonTokens(from = 0, to = this.tokens.length): JsonToken[] {
    const jsonTokens: JsonToken[] = [];

    for (const token of this.tokens.slice(from, to)) {
      const jsonToken = toJsonToken(this.bytes, token, this.baseOffset);

      if (jsonToken) {
        jsonTokens.push(jsonToken);
      }
    }

    return jsonTokens;
  }

  cursor() {
    return new TokenCursor(this);
  }
}

/**
 * Walks the tokens of a {@link TokenSpan} front to back. Comments are
 * invisible to the cursor.
 */
export class TokenCursor {
  protected index = 0;

  constructor(readonly span: TokenSpan) {}

  get isExhausted() {
    return this.peek() === undefined;
  }

  peek(): PositionedToken | undefined {
    const { tokens } = this.span;

    while (this.index < tokens.length && tokens[this.index].name === 'comment') {
      this.index += 1;
    }

    return tokens.at(this.index);
  }

  next(): PositionedToken {
    const token = this.peek();

    if (!token) {
      const last = this.span.tokens.at(-1);
      throw new DecodeError(
        'unexpected end of element',
        last ? this.span.baseOffset + last.end : this.span.position
      );
    }

    this.index += 1;
    return token;
  }

  expect(name: PositionedTokenName): PositionedToken {
    const token = this.next();

    if (token.name !== name) {
      throw this.mismatch(tokenDescriptions[name], token);
    }

    return token;
  }

  readString(): string {
    const token = this.next();

    if (token.name !== 'stringValue') {
      throw this.mismatch('a string', token);
    }

    return this.span.stringOf(token);
  }

  readNumberText(): string {
    const token = this.next();

    if (token.name !== 'numberValue') {
      throw this.mismatch('a number', token);
    }

    return this.span.textOf(token);
  }

  readBoolean(): boolean {
    const token = this.next();

    if (token.name === 'trueValue' || token.name === 'falseValue') {
      return token.name === 'trueValue';
    }

    throw this.mismatch('a boolean', token);
  }

  /**
   * Reads and discards one complete value, nested or not.
   */
  skipValue(): void {
    this.valueBounds();
  }

  /**
   * Reads one complete value and assembles it with stream-json.
   */
  readJsonValue(): JsonValue {
    const { from, to } = this.valueBounds();
    return assembleValue(this.span.toJsonTokens(from, to));
  }

  mismatch(expected: string, token: PositionedToken) {
    return new DecodeError(
      `expected ${expected} but saw ${tokenDescriptions[token.name]}`,
      this.span.positionOf(token)
    );
  }

  protected valueBounds() {
    const { isValueComplete, updateDepth } = useDepthTracking();
    const first = this.next();

    if (first.name === 'keyValue' || first.name === 'endObject' || first.name === 'endArray') {
      throw this.mismatch('a value', first);
    }

    const from = this.index - 1;
    updateDepth(first);

    while (!isValueComplete()) {
      updateDepth(this.next());
    }

    return { from, to: this.index };
  }
}
