import { Readable } from 'node:stream';

import {
  DecodePlan,
  Types,
  declareType,
  field,
  integerPlan,
  objectPlan,
  stringPlan
} from 'universe/decode';

import { JsonSyntaxError } from 'universe/error';
import { createArrayStreamer, pipeJsonArray } from 'universe/stream';
import { flushPromises } from 'testverse/setup';

type Item = { id: number; name: string };

/**
 * Resolves with every `'data'` chunk once `stream` ends or errors.
 */
function drain(stream: NodeJS.ReadableStream) {
  return new Promise<{ entries: unknown[]; error: unknown }>((resolve) => {
    const entries: unknown[] = [];

    stream.on('data', (entry: unknown) => entries.push(entry));
    stream.on('error', (error: unknown) => resolve({ entries, error }));
    stream.on('end', () => resolve({ entries, error: undefined }));
  });
}

describe('::createArrayStreamer', () => {
  it('emits an entry per element with its index', async () => {
    expect.hasAssertions();

    const streamer = createArrayStreamer();

    Readable.from(['[1,', 'null, "x", {"a"', ':[]}]']).pipe(streamer);

    await expect(drain(streamer)).resolves.toStrictEqual({
      entries: [
        { key: 0, value: 1 },
        { key: 1, value: null },
        { key: 2, value: 'x' },
        { key: 3, value: { a: [] } }
      ],
      error: undefined
    });
  });

  it('emits entries decoded before a syntax error and then the error', async () => {
    expect.hasAssertions();

    const streamer = createArrayStreamer();

    Readable.from(['[1, x]']).pipe(streamer);

    const { entries, error } = await drain(streamer);

    expect(entries).toStrictEqual([{ key: 0, value: 1 }]);
    expect(error).toBeInstanceOf(JsonSyntaxError);
    expect(error).toHaveProperty('message', 'unexpected character "x" at byte offset 4');
  });

  it('ignores bytes written after the array ends', async () => {
    expect.hasAssertions();

    const streamer = createArrayStreamer();

    Readable.from(['[true] trailing', ' garbage']).pipe(streamer);

    await expect(drain(streamer)).resolves.toStrictEqual({
      entries: [{ key: 0, value: true }],
      error: undefined
    });
  });

  it('releases its output buffer when destroyed', async () => {
    expect.hasAssertions();

    const plan = new DecodePlan(Types.number, (cursor) => Number(cursor.readNumberText()));
    const streamer = createArrayStreamer({ plan });
    const closed = new Promise((resolve) => streamer.once('close', resolve));

    streamer.write('[1,');
    await flushPromises();

    expect(plan.pool.outstanding).toBe(1);

    streamer.destroy();
    await closed;
    await flushPromises();

    expect(plan.pool.outstanding).toBe(0);
  });
});

describe('::pipeJsonArray', () => {
  it('decodes elements of a readable stream with a plan', async () => {
    expect.hasAssertions();

    const plan = objectPlan(declareType<Item>('Item'), {
      create: () => ({ id: 0, name: '' }),
      fields: {
        id: field(integerPlan, (item: Item, id) => (item.id = id)),
        name: field(stringPlan, (item: Item, name) => (item.name = name))
      }
    });

    const pipeline = pipeJsonArray(
      Readable.from([Buffer.from('[{"id":1,"na'), Buffer.from('me":"A"},{"id":2}]')]),
      { plan }
    );

    await expect(drain(pipeline)).resolves.toStrictEqual({
      entries: [
        { key: 0, value: { id: 1, name: 'A' } },
        { key: 1, value: { id: 2, name: '' } }
      ],
      error: undefined
    });
  });
});
