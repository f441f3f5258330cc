import { assembleValue } from 'multiverse/stream-json-extended';
import { tokenizeObject, tokenizeText } from 'multiverse/stream-json-extended/util';

import type { JsonToken } from 'multiverse/stream-json-extended';
import type { JsonValue } from 'type-fest';

describe('|>value-assembler', () => {
  describe('::assembleValue', () => {
    it('reassembles values disassembled by stream-json', async () => {
      expect.hasAssertions();

      const values: JsonValue[] = [
        null,
        true,
        0,
        -1.5,
        'string',
        [],
        {},
        [1, 'two', [3], { four: 4 }],
        { a: { b: { c: [null, false, 'd'] } }, e: '' }
      ];

      for (const value of values) {
        // eslint-disable-next-line no-await-in-loop
        expect(assembleValue(await tokenizeObject(value))).toStrictEqual(value);
      }
    });

    it('assembles tokens parsed from text by stream-json', async () => {
      expect.hasAssertions();

      expect(assembleValue(await tokenizeText('{"id":1,"tags":["x","y"]}'))).toStrictEqual({
        id: 1,
        tags: ['x', 'y']
      });
    });

    it('assembles literal tokens whose values are not strings', async () => {
      expect.hasAssertions();

      const tokens: JsonToken[] = [
        { name: 'startArray' },
        { name: 'trueValue', value: true },
        { name: 'falseValue', value: false },
        { name: 'nullValue', value: null },
        { name: 'numberValue', value: '2' },
        { name: 'endArray' }
      ];

      expect(assembleValue(tokens)).toStrictEqual([true, false, null, 2]);
    });

    it('rejects token sequences that are not exactly one value', async () => {
      expect.hasAssertions();

      expect(() => assembleValue([])).toThrow('cannot assemble a value out of zero tokens');

      expect(() => assembleValue([{ name: 'startObject' }])).toThrow(
        'tokens ended before the value was fully assembled'
      );

      expect(() =>
        assembleValue([
          { name: 'nullValue', value: null },
          { name: 'nullValue', value: null }
        ])
      ).toThrow('tokens continue past the end of the assembled value');
    });
  });
});
