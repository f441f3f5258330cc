import assert from 'node:assert';
import { TextDecoder } from 'node:util';

import type {
  JsonToken,
  PositionedToken,
  PositionedTokenName
} from '../stream-json-extended';

/**
 * How `//` and `/* *\/` comments are treated by {@link ResumableTokenizer}.
 *
 * - `disallow`: comments are a syntax error.
 * - `skip`: comments are treated like whitespace.
 * - `allow`: comments are reported as `comment` tokens.
 */
export type CommentHandling = 'disallow' | 'skip' | 'allow';

/**
 * Options used to configure {@link ResumableTokenizer}.
 */
export type TokenizerOptions = {
  /**
   * @default 'disallow'
   */
  commentHandling?: CommentHandling;
  /**
   * If `true`, a single comma is accepted before the closing bracket of an
   * array or object.
   *
   * @default false
   */
  allowTrailingCommas?: boolean;
  /**
   * The maximum number of nested objects and arrays.
   *
   * @default 64
   */
  maxDepth?: number;
};

type Container = 'object' | 'array';

// prettier-ignore
type Expectation =
  | 'value'     // ? A value or, if canClose, the end of the current array
  | 'key'       // ? A key or, if canClose, the end of the current object
  | 'colon'     // ? The colon following a key
  | 'separator' // ? A comma or the end of the current container
  | 'end';      // ? Nothing; the top-level value is complete

/**
 * Everything needed to resume tokenizing at a token boundary. Snapshots are
 * immutable and can be handed to any number of {@link ResumableTokenizer}s.
 */
export type TokenizerState = {
  readonly options: Readonly<Required<TokenizerOptions>>;
  /**
   * The open containers, outermost first. Its length is the current depth.
   */
  readonly containers: readonly Container[];
  readonly expecting: Expectation;
  readonly canClose: boolean;
  /**
   * `true` once the start of the stream has been checked for a byte order
   * mark.
   */
  readonly sawPreamble: boolean;
};

/**
 * Thrown when bytes violate the JSON grammar under the active
 * {@link TokenizerOptions}.
 */
export class JsonSyntaxError extends SyntaxError {
  override name = 'JsonSyntaxError';

  constructor(
    message: string,
    /**
     * The absolute byte offset within the stream where the problem was found.
     */
    readonly position: number
  ) {
    super(`${message} at byte offset ${position}`);
  }
}

const Byte = {
  tab: 0x09,
  lineFeed: 0x0a,
  carriageReturn: 0x0d,
  space: 0x20,
  quote: 0x22,
  asterisk: 0x2a,
  plus: 0x2b,
  comma: 0x2c,
  minus: 0x2d,
  period: 0x2e,
  slash: 0x2f,
  zero: 0x30,
  nine: 0x39,
  colon: 0x3a,
  upperE: 0x45,
  leftBracket: 0x5b,
  backslash: 0x5c,
  rightBracket: 0x5d,
  lowerE: 0x65,
  lowerF: 0x66,
  lowerN: 0x6e,
  lowerT: 0x74,
  lowerU: 0x75,
  leftBrace: 0x7b,
  rightBrace: 0x7d
} as const;

const byteOrderMark = [0xef, 0xbb, 0xbf] as const;
const simpleEscapes = new Set([...'"\\/bfnrt'].map((char) => char.charCodeAt(0)));

const literals = {
  trueValue: Buffer.from('true'),
  falseValue: Buffer.from('false'),
  nullValue: Buffer.from('null')
} as const;

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Returns a fresh {@link TokenizerState} for the start of a stream.
 */
export function createTokenizerState(options?: TokenizerOptions): TokenizerState {
  const maxDepth = options?.maxDepth ?? 64;

  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, saw: ${maxDepth}`);
  }

  return {
    options: {
      commentHandling: options?.commentHandling ?? 'disallow',
      allowTrailingCommas: options?.allowTrailingCommas ?? false,
      maxDepth
    },
    containers: [],
    expecting: 'value',
    canClose: false,
    sawPreamble: false
  };
}

/**
 * A forward-only JSON scanner over one span of UTF-8 bytes.
 *
 * When the span ends in the middle of a token, `read` returns `false` without
 * consuming that token. {@link ResumableTokenizer.currentState} can then be
 * used to seed a new tokenizer given the same bytes from
 * {@link ResumableTokenizer.position} onward, plus whatever arrived since.
 *
 * Only token boundaries and kinds are determined here. Token content is
 * decoded on demand with {@link decodeStringToken} and
 * {@link decodeTokenText}.
 */
export class ResumableTokenizer {
  protected readonly isFinalSpan: boolean;
  protected readonly allowEmptyDocument: boolean;
  protected readonly baseOffset: number;
  protected readonly options: TokenizerState['options'];

  protected containers: Container[];
  protected expecting: Expectation;
  protected canClose: boolean;
  protected sawPreamble: boolean;

  protected offset = 0;
  protected currentToken: PositionedToken | undefined = undefined;

  constructor(
    protected readonly bytes: Uint8Array,
    {
      isFinalSpan = false,
      allowEmptyDocument = false,
      state = createTokenizerState(),
      baseOffset = 0
    }: {
      /**
       * `true` if no bytes will ever follow this span.
       *
       * @default false
       */
      isFinalSpan?: boolean;
      /**
       * If `true`, a final span ending before any top-level value has begun
       * (nothing but whitespace, comments, or a byte order mark) is not an
       * error; `read` simply returns `false`.
       *
       * @default false
       */
      allowEmptyDocument?: boolean;
      /**
       * The state to resume from.
       */
      state?: TokenizerState;
      /**
       * The absolute offset of `bytes[0]` within the stream. Only used when
       * reporting errors.
       *
       * @default 0
       */
      baseOffset?: number;
    } = {}
  ) {
    this.isFinalSpan = isFinalSpan;
    this.allowEmptyDocument = allowEmptyDocument;
    this.baseOffset = baseOffset;
    this.options = state.options;
    this.containers = [...state.containers];
    this.expecting = state.expecting;
    this.canClose = state.canClose;
    this.sawPreamble = state.sawPreamble;
  }

  /**
   * The offset up to which bytes have been scanned. Right after `read`
   * returns `true`, this is equal to `token.end`.
   */
  get position() {
    return this.offset;
  }

  /**
   * The current nesting depth.
   */
  get depth() {
    return this.containers.length;
  }

  /**
   * The token produced by the most recent successful call to `read`.
   */
  get token(): PositionedToken {
    assert(this.currentToken !== undefined, 'no token has been read yet');
    return this.currentToken;
  }

  /**
   * A snapshot of the state at {@link ResumableTokenizer.position}.
   */
  get currentState(): TokenizerState {
    return {
      options: this.options,
      containers: [...this.containers],
      expecting: this.expecting,
      canClose: this.canClose,
      sawPreamble: this.sawPreamble
    };
  }

  /**
   * Advances to the next token. Returns `false` once the span is exhausted,
   * which is either because more bytes are needed to complete the next token
   * or because the final span ended after a complete top-level value.
   */
  read(): boolean {
    if (!this.sawPreamble && !this.skipPreamble()) {
      return false;
    }

    for (;;) {
      const index = this.skipWhitespace(this.offset);
      this.offset = index;

      if (index >= this.bytes.length) {
        return this.finish();
      }

      const byte = this.bytes[index];

      if (byte === Byte.slash) {
        const end = this.scanComment(index);

        if (end === undefined) {
          return false;
        }

        if (this.options.commentHandling === 'allow') {
          return this.emit('comment', index, end);
        }

        this.offset = end;
        continue;
      }

      switch (this.expecting) {
        case 'end': {
          throw this.error(`unexpected ${describe(byte)} after the top-level value`, index);
        }

        case 'colon': {
          if (byte !== Byte.colon) {
            throw this.error(`expected ":" but saw ${describe(byte)}`, index);
          }

          this.offset = index + 1;
          this.expecting = 'value';
          this.canClose = false;
          continue;
        }

        case 'separator': {
          if (byte === Byte.comma) {
            this.offset = index + 1;
            this.expecting = this.containers.at(-1) === 'array' ? 'value' : 'key';
            this.canClose = this.options.allowTrailingCommas;
            continue;
          }

          return this.close(byte, index);
        }

        case 'key': {
          if (byte === Byte.quote) {
            const scanned = this.scanString(index);

            if (scanned === undefined) {
              return false;
            }

            this.expecting = 'colon';
            return this.emit('keyValue', index, scanned.end, scanned.escaped);
          }

          if (byte === Byte.rightBrace && this.canClose) {
            return this.close(byte, index);
          }

          throw this.error(
            byte === Byte.rightBrace
              ? 'trailing commas are not allowed'
              : `expected a property name but saw ${describe(byte)}`,
            index
          );
        }

        case 'value': {
          return this.readValue(byte, index);
        }
      }
    }
  }

  protected readValue(byte: number, index: number): boolean {
    switch (byte) {
      case Byte.leftBrace: {
        return this.open('object', index);
      }

      case Byte.leftBracket: {
        return this.open('array', index);
      }

      case Byte.rightBracket: {
        if (this.canClose) {
          return this.close(byte, index);
        }

        throw this.error(
          this.containers.at(-1) === 'array'
            ? 'trailing commas are not allowed'
            : `unexpected ${describe(byte)}`,
          index
        );
      }

      case Byte.quote: {
        const scanned = this.scanString(index);

        if (scanned === undefined) {
          return false;
        }

        this.completeValue();
        return this.emit('stringValue', index, scanned.end, scanned.escaped);
      }

      case Byte.lowerT: {
        return this.readLiteral('trueValue', index);
      }

      case Byte.lowerF: {
        return this.readLiteral('falseValue', index);
      }

      case Byte.lowerN: {
        return this.readLiteral('nullValue', index);
      }
    }

    if (byte === Byte.minus || isDigit(byte)) {
      const end = this.scanNumber(index);

      if (end === undefined) {
        return false;
      }

      this.completeValue();
      return this.emit('numberValue', index, end);
    }

    throw this.error(`unexpected ${describe(byte)}`, index);
  }

  protected readLiteral(name: keyof typeof literals, index: number): boolean {
    const literal = literals[name];

    for (let offset = 0; offset < literal.length; offset++) {
      if (index + offset >= this.bytes.length) {
        return this.incomplete(`the literal "${literal.toString()}"`, index);
      }

      if (this.bytes[index + offset] !== literal[offset]) {
        throw this.error(`invalid literal, expected "${literal.toString()}"`, index);
      }
    }

    this.completeValue();
    return this.emit(name, index, index + literal.length);
  }

  protected open(container: Container, index: number): boolean {
    if (this.containers.length >= this.options.maxDepth) {
      throw this.error(`maximum depth of ${this.options.maxDepth} exceeded`, index);
    }

    this.containers.push(container);
    this.expecting = container === 'array' ? 'value' : 'key';
    this.canClose = true;

    return this.emit(container === 'array' ? 'startArray' : 'startObject', index, index + 1);
  }

  protected close(byte: number, index: number): boolean {
    const container = this.containers.at(-1);

    if (
      (byte === Byte.rightBracket && container === 'array') ||
      (byte === Byte.rightBrace && container === 'object')
    ) {
      this.containers.pop();
      this.completeValue();
      return this.emit(container === 'array' ? 'endArray' : 'endObject', index, index + 1);
    }

    throw this.error(
      container === undefined
        ? `unexpected ${describe(byte)}`
        : `expected "," or "${container === 'array' ? ']' : '}'}" but saw ${describe(byte)}`,
      index
    );
  }

  protected completeValue() {
    this.expecting = this.containers.length === 0 ? 'end' : 'separator';
  }

  protected emit(name: PositionedTokenName, start: number, end: number, escaped = false) {
    this.currentToken = { name, start, end, escaped };
    this.offset = end;
    return true;
  }

  /**
   * Handles the end of the span.
   */
  protected finish(): boolean {
    const isEmptyDocument = this.containers.length === 0 && this.expecting === 'value';

    if (
      !this.isFinalSpan ||
      this.expecting === 'end' ||
      (isEmptyDocument && this.allowEmptyDocument)
    ) {
      return false;
    }

    throw this.error(
      isEmptyDocument
        ? 'expected a JSON value but reached the end of data'
        : 'unexpected end of data',
      this.bytes.length
    );
  }

  /**
   * Reports that the token starting at `index` runs past the end of the span.
   * This is only acceptable if more bytes may still arrive.
   */
  protected incomplete(what: string, index: number): false {
    if (this.isFinalSpan) {
      throw this.error(`unexpected end of data within ${what} starting`, index);
    }

    return false;
  }

  protected skipPreamble(): boolean {
    const available = this.bytes.length - this.offset;

    for (let index = 0; index < Math.min(available, byteOrderMark.length); index++) {
      if (this.bytes[this.offset + index] !== byteOrderMark[index]) {
        this.sawPreamble = true;
        return true;
      }
    }

    if (available < byteOrderMark.length) {
      // ? Could still turn out to be a byte order mark
      if (!this.isFinalSpan) {
        return false;
      }

      this.sawPreamble = true;
      return true;
    }

    this.offset += byteOrderMark.length;
    this.sawPreamble = true;
    return true;
  }

  protected skipWhitespace(index: number) {
    while (index < this.bytes.length && isWhitespace(this.bytes[index])) {
      index += 1;
    }

    return index;
  }

  /**
   * Returns the offset after the comment starting at `index` or `undefined` if
   * the comment is cut off by the end of a non-final span.
   */
  protected scanComment(index: number): number | undefined {
    if (this.options.commentHandling === 'disallow') {
      throw this.error('comments are not allowed', index);
    }

    const next = index + 1;

    if (next >= this.bytes.length) {
      return this.incomplete('a comment', index) || undefined;
    }

    if (this.bytes[next] === Byte.slash) {
      let end = next + 1;

      while (
        end < this.bytes.length &&
        this.bytes[end] !== Byte.lineFeed &&
        this.bytes[end] !== Byte.carriageReturn
      ) {
        end += 1;
      }

      // ? A line comment is only known to be over once its line ends, unless
      // ? the data itself ends
      return end < this.bytes.length || this.isFinalSpan ? end : undefined;
    }

    if (this.bytes[next] === Byte.asterisk) {
      for (let end = next + 1; end + 1 < this.bytes.length; end++) {
        if (this.bytes[end] === Byte.asterisk && this.bytes[end + 1] === Byte.slash) {
          return end + 2;
        }
      }

      return this.incomplete('a comment', index) || undefined;
    }

    throw this.error(`unexpected ${describe(Byte.slash)}`, index);
  }

  /**
   * Returns the offset after the string starting at `index` or `undefined` if
   * the string is cut off by the end of a non-final span.
   */
  protected scanString(index: number): { end: number; escaped: boolean } | undefined {
    let escaped = false;
    let cursor = index + 1;

    while (cursor < this.bytes.length) {
      const byte = this.bytes[cursor];

      if (byte === Byte.quote) {
        return { end: cursor + 1, escaped };
      }

      if (byte < Byte.space) {
        throw this.error('unescaped control character in string', cursor);
      }

      if (byte !== Byte.backslash) {
        cursor += 1;
        continue;
      }

      escaped = true;

      if (cursor + 1 >= this.bytes.length) {
        break;
      }

      const escape = this.bytes[cursor + 1];

      if (escape === Byte.lowerU) {
        for (let digit = 2; digit < 6; digit++) {
          if (cursor + digit >= this.bytes.length) {
            return this.incomplete('a string', index) || undefined;
          }

          if (!isHexDigit(this.bytes[cursor + digit])) {
            throw this.error('invalid unicode escape sequence', cursor);
          }
        }

        cursor += 6;
      } else if (simpleEscapes.has(escape)) {
        cursor += 2;
      } else {
        throw this.error('invalid escape sequence', cursor);
      }
    }

    return this.incomplete('a string', index) || undefined;
  }

  /**
   * Returns the offset after the number starting at `index` or `undefined` if
   * the number might continue past the end of a non-final span.
   */
  protected scanNumber(index: number): number | undefined {
    let cursor = index;

    if (this.bytes[cursor] === Byte.minus) {
      cursor += 1;
    }

    cursor = this.scanDigits(cursor, index, { leadingZero: true });

    if (cursor < 0) {
      return undefined;
    }

    if (this.bytes[cursor] === Byte.period) {
      cursor = this.scanDigits(cursor + 1, index, { leadingZero: false });

      if (cursor < 0) {
        return undefined;
      }
    }

    if (this.bytes[cursor] === Byte.lowerE || this.bytes[cursor] === Byte.upperE) {
      cursor += 1;

      if (this.bytes[cursor] === Byte.plus || this.bytes[cursor] === Byte.minus) {
        cursor += 1;
      }

      cursor = this.scanDigits(cursor, index, { leadingZero: false });

      if (cursor < 0) {
        return undefined;
      }
    }

    if (cursor >= this.bytes.length) {
      // ? More digits could still be on the way
      return this.isFinalSpan ? cursor : undefined;
    }

    if (!isDelimiter(this.bytes[cursor])) {
      throw this.error('invalid number', index);
    }

    return cursor;
  }

  /**
   * Scans a run of one or more digits starting at `cursor`. If `leadingZero`
   * is `true`, a lone `0` is the whole run (as in the integer part of a JSON
   * number). Returns `-1` when the run is cut off by the end of a non-final
   * span before its first digit.
   */
  protected scanDigits(
    cursor: number,
    numberStart: number,
    { leadingZero }: { leadingZero: boolean }
  ): number {
    if (cursor >= this.bytes.length) {
      this.incomplete('a number', numberStart);
      return -1;
    }

    if (!isDigit(this.bytes[cursor])) {
      throw this.error('invalid number', numberStart);
    }

    if (leadingZero && this.bytes[cursor] === Byte.zero) {
      return cursor + 1;
    }

    while (cursor < this.bytes.length && isDigit(this.bytes[cursor])) {
      cursor += 1;
    }

    return cursor;
  }

  protected error(message: string, index: number) {
    return new JsonSyntaxError(message, this.baseOffset + index);
  }
}

/**
 * Returns the unescaped content of a `stringValue` or `keyValue` token.
 */
export function decodeStringToken(
  bytes: Uint8Array,
  token: PositionedToken,
  baseOffset = 0
): string {
  if (!token.escaped) {
    return decodeUtf8(bytes, token, baseOffset, token.start + 1, token.end - 1);
  }

  const value: unknown = JSON.parse(decodeTokenText(bytes, token, baseOffset));
  assert(typeof value === 'string', 'escaped token did not decode to a string');
  return value;
}

/**
 * Returns the raw text of any token, e.g. the digits of a `numberValue`.
 *
 * @param baseOffset The absolute offset of `bytes[0]`, used when reporting
 * malformed UTF-8.
 */
export function decodeTokenText(
  bytes: Uint8Array,
  token: PositionedToken,
  baseOffset = 0
): string {
  return decodeUtf8(bytes, token, baseOffset, token.start, token.end);
}

function decodeUtf8(
  bytes: Uint8Array,
  token: PositionedToken,
  baseOffset: number,
  start: number,
  end: number
) {
  try {
    return utf8.decode(bytes.subarray(start, end));
  } catch (error) {
    // ? A fatal TextDecoder throws TypeError on malformed input
    if (error instanceof TypeError) {
      throw new JsonSyntaxError('invalid UTF-8 sequence', baseOffset + token.start);
    }

    throw error;
  }
}

/**
 * Converts a token into the packed {@link JsonToken} stream-json would emit for
 * it. Comments have no such counterpart and yield `undefined`.
 */
export function toJsonToken(
  bytes: Uint8Array,
  token: PositionedToken,
  baseOffset = 0
): JsonToken | undefined {
  const { name } = token;

  switch (name) {
    case 'keyValue':
    case 'stringValue': {
      return { name, value: decodeStringToken(bytes, token, baseOffset) };
    }

    case 'numberValue': {
      return { name, value: decodeTokenText(bytes, token, baseOffset) };
    }

    case 'trueValue': {
      return { name, value: true };
    }

    case 'falseValue': {
      return { name, value: false };
    }

    case 'nullValue': {
      return { name, value: null };
    }

    case 'comment': {
      return undefined;
    }

    default: {
      return { name };
    }
  }
}

function isWhitespace(byte: number) {
  return (
    byte === Byte.space ||
    byte === Byte.lineFeed ||
    byte === Byte.carriageReturn ||
    byte === Byte.tab
  );
}

function isDigit(byte: number) {
  return byte >= Byte.zero && byte <= Byte.nine;
}

function isHexDigit(byte: number) {
  return (
    isDigit(byte) ||
    (byte >= 0x41 && byte <= 0x46) || // ? A-F
    (byte >= 0x61 && byte <= 0x66) // ? a-f
  );
}

function isDelimiter(byte: number) {
  return (
    isWhitespace(byte) ||
    byte === Byte.comma ||
    byte === Byte.rightBracket ||
    byte === Byte.rightBrace ||
    byte === Byte.slash
  );
}

function describe(byte: number) {
  return byte >= 0x21 && byte <= 0x7e
    ? `character "${String.fromCharCode(byte)}"`
    : `byte 0x${byte.toString(16).padStart(2, '0')}`;
}
