/* eslint-disable unicorn/prevent-abbreviations */
import { Readable } from 'node:stream';

import { parser } from 'stream-json';
import { disassembler } from 'stream-json/Disassembler';
import { chain } from 'stream-chain';

import type { JsonToken } from './types/global';
import type { JsonValue } from 'type-fest';

/**
 * Turns `object` into the packed {@link JsonToken}s stream-json's
 * `disassembler` would produce for it.
 */
export async function tokenizeObject(object: JsonValue): Promise<JsonToken[]> {
  // ? ObjectMode streams cannot handle raw null values
  if (object === null) {
    return [{ name: 'nullValue', value: null }];
  }

  return chain([
    Readable.from([object]),
    disassembler({ packValues: true, streamValues: false })
  ]).toArray();
}

/**
 * Turns JSON `text` into the packed {@link JsonToken}s stream-json's `parser`
 * would produce for it. Useful as a reference tokenization.
 */
export async function tokenizeText(text: string): Promise<JsonToken[]> {
  return chain([
    Readable.from([Buffer.from(text, 'utf8')]),
    parser({ packValues: true, streamValues: false })
  ]).toArray();
}
