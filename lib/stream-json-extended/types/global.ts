export type JsonStreamedObjectTokenName =
  | 'startObject'
  | 'endObject'
  | 'startArray'
  | 'endArray';

export type JsonPackedPrimitiveTokenName =
  | 'keyValue'
  | 'nullValue'
  | 'trueValue'
  | 'falseValue'
  | 'stringValue'
  | 'numberValue';

export type JsonTokenName = JsonStreamedObjectTokenName | JsonPackedPrimitiveTokenName;

/**
 * A token as it is produced by stream-json's `parser` and `disassembler` when
 * values are packed and never streamed.
 */
export type JsonToken =
  | {
      name: Extract<JsonPackedPrimitiveTokenName, 'keyValue' | 'stringValue' | 'numberValue'>;
      value: string;
    }
  | { name: Extract<JsonPackedPrimitiveTokenName, 'nullValue'>; value: null }
  | { name: Extract<JsonPackedPrimitiveTokenName, 'trueValue'>; value: true }
  | { name: Extract<JsonPackedPrimitiveTokenName, 'falseValue'>; value: false }
  | { name: JsonStreamedObjectTokenName; value?: undefined };

/**
 * Every token name a byte-level tokenizer can report. `comment` only occurs
 * when comments are surfaced rather than skipped.
 */
export type PositionedTokenName = JsonTokenName | 'comment';

/**
 * A token located within a span of UTF-8 bytes. Its content is not decoded;
 * `start` and `end` delimit the raw bytes, `end` being the offset immediately
 * after the token.
 */
export type PositionedToken = {
  name: PositionedTokenName;
  start: number;
  end: number;
  /**
   * `true` if a string or key token contains at least one escape sequence.
   */
  escaped: boolean;
};
