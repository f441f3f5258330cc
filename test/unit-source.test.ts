import { Readable } from 'node:stream';

import { CancelledError } from 'universe/error';
import { ByteSequence, createPipe, fromAsyncIterable } from 'universe/source';
import { flushPromises } from 'testverse/setup';

import type { ChunkReadResult } from 'universe/source';

function textOf({ buffer }: ChunkReadResult) {
  return Buffer.from(buffer.toUint8Array()).toString('utf8');
}

describe('::ByteSequence', () => {
  it('joins segments only when there is more than one', async () => {
    expect.hasAssertions();

    const single = Buffer.from('ab');

    expect(new ByteSequence([single]).toUint8Array()).toBe(single);
    expect(new ByteSequence([single]).length).toBe(2);

    const joined = new ByteSequence([single, Buffer.from('c')]);

    expect(joined.length).toBe(3);
    expect(Buffer.from(joined.toUint8Array()).toString()).toBe('abc');
    expect(new ByteSequence([]).isEmpty).toBeTrue();
  });
});

describe('::createPipe', () => {
  it('delivers written bytes and discards consumed ones', async () => {
    expect.hasAssertions();

    const { reader, writer } = createPipe();

    await expect(writer.write('abc')).resolves.toBeTrue();

    const first = await reader.read();

    expect(textOf(first)).toBe('abc');
    expect(first.isCompleted).toBeFalse();
    expect(first.isCanceled).toBeFalse();

    reader.advanceTo(1, 3);
    await writer.write(Buffer.from('de'));

    const second = await reader.read();

    expect(textOf(second)).toBe('bcde');
    expect(second.buffer.segments).toHaveLength(1);

    reader.advanceTo(4);
    writer.complete();

    const third = await reader.read();

    expect(third.buffer.isEmpty).toBeTrue();
    expect(third.isCompleted).toBeTrue();
  });

  it('appends to unconsumed bytes in place rather than joining them on every read', async () => {
    expect.hasAssertions();

    const { reader, writer } = createPipe();

    await writer.write('abc');

    const [first] = (await reader.read()).buffer.segments;

    reader.advanceTo(1, 3);
    await writer.write('d');

    const [second] = (await reader.read()).buffer.segments;

    expect(second.buffer).toBe(first.buffer);
    expect(second.byteOffset).toBe(first.byteOffset + 1);
    expect(Buffer.from(second).toString()).toBe('bcd');
  });

  it('leaves bytes from an earlier read intact when the store grows', async () => {
    expect.hasAssertions();

    const { reader, writer } = createPipe({ highWaterMark: 16384 });

    await writer.write('ab');

    const [first] = (await reader.read()).buffer.segments;

    reader.advanceTo(0, 2);
    await writer.write('x'.repeat(5000));

    const second = await reader.read();

    expect(Buffer.from(first).toString()).toBe('ab');
    expect(second.buffer.length).toBe(5002);
    expect(textOf(second).slice(0, 3)).toBe('abx');
  });

  it('copies written chunks', async () => {
    expect.hasAssertions();

    const { reader, writer } = createPipe();
    const chunk = Buffer.from('ab');

    await writer.write(chunk);
    chunk[0] = 0x7a;

    expect(textOf(await reader.read())).toBe('ab');
  });

  it('waits for bytes beyond those examined', async () => {
    expect.hasAssertions();

    const { reader, writer } = createPipe();

    await writer.write('ab');
    await reader.read();
    reader.advanceTo(0, 2);

    let settled = false;
    const next = reader.read().then((result) => {
      settled = true;
      return result;
    });

    await flushPromises();
    expect(settled).toBeFalse();

    await writer.write('c');

    expect(textOf(await next)).toBe('abc');
  });

  it('rejects out-of-range and out-of-order acknowledgements', async () => {
    expect.hasAssertions();

    const { reader, writer } = createPipe();

    expect(() => reader.advanceTo(0)).toThrow(
      'advanceTo was called without a preceding read'
    );

    await writer.write('ab');
    await reader.read();

    expect(() => reader.advanceTo(-1)).toThrow(RangeError);
    expect(() => reader.advanceTo(2, 1)).toThrow(RangeError);
    expect(() => reader.advanceTo(0, 3)).toThrow(RangeError);
    expect(() => reader.advanceTo(1.5, 2)).toThrow(RangeError);

    await expect(reader.read()).rejects.toThrow('read was called again before advanceTo');
  });

  it('holds writes until unconsumed bytes fall to the high water mark', async () => {
    expect.hasAssertions();

    const { reader, writer } = createPipe({ highWaterMark: 4 });

    let settled = false;
    const write = writer.write('abcdef').then((result) => {
      settled = true;
      return result;
    });

    await flushPromises();
    expect(settled).toBeFalse();

    await reader.read();
    reader.advanceTo(3, 6);

    await expect(write).resolves.toBeTrue();
  });

  it('rethrows the error a writer completes with once buffered bytes are used', async () => {
    expect.hasAssertions();

    const { reader, writer } = createPipe();
    const error = new Error('upstream failure');

    await writer.write('ab');
    writer.complete(error);

    const result = await reader.read();

    expect(textOf(result)).toBe('ab');
    expect(result.isCompleted).toBeFalse();

    reader.advanceTo(2);

    await expect(reader.read()).rejects.toBe(error);
  });

  it('releases a pending read when it is canceled', async () => {
    expect.hasAssertions();

    const { reader, writer } = createPipe();
    const pending = reader.read();

    reader.cancelPendingRead();

    const result = await pending;

    expect(result.isCanceled).toBeTrue();
    expect(result.isCompleted).toBeFalse();
    expect(result.buffer.isEmpty).toBeTrue();

    reader.advanceTo(0);
    await writer.write('a');

    const next = await reader.read();

    expect(next.isCanceled).toBeFalse();
    expect(textOf(next)).toBe('a');
  });

  it('resolves writes to false once the reader completes', async () => {
    expect.hasAssertions();

    const { reader, writer } = createPipe({ highWaterMark: 1 });
    const pending = writer.write('abc');

    reader.complete();

    await expect(pending).resolves.toBeFalse();
    await expect(writer.write('d')).resolves.toBeFalse();
  });

  it('rejects writes after the writer completes', async () => {
    expect.hasAssertions();

    const { writer } = createPipe();

    writer.complete();

    await expect(writer.write('a')).rejects.toThrow(
      'cannot write to a pipe after it was completed'
    );
  });

  it('rejects a read with CancelledError when its signal fires', async () => {
    expect.hasAssertions();

    const { reader } = createPipe();
    const controller = new AbortController();
    const pending = reader.read(controller.signal);

    controller.abort('stop');

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    await expect(pending).rejects.toHaveProperty('cause', 'stop');
  });
});

describe('::fromAsyncIterable', () => {
  it('pulls the next chunk only once buffered bytes have been examined', async () => {
    expect.hasAssertions();

    let pulled = 0;

    async function* chunks() {
      pulled += 1;
      yield 'ab';
      pulled += 1;
      yield Buffer.from('cd');
    }

    const source = fromAsyncIterable(chunks());

    expect(pulled).toBe(0);
    expect(textOf(await source.read())).toBe('ab');
    expect(pulled).toBe(1);

    source.advanceTo(1, 2);

    expect(textOf(await source.read())).toBe('bcd');
    expect(pulled).toBe(2);

    source.advanceTo(3);

    const last = await source.read();

    expect(last.isCompleted).toBeTrue();
    expect(last.buffer.isEmpty).toBeTrue();
  });

  it('keeps a chunk that arrives after a cancelled read', async () => {
    expect.hasAssertions();

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => (release = resolve));

    async function* chunks() {
      await gate;
      yield 'late';
    }

    const source = fromAsyncIterable(chunks());
    const controller = new AbortController();
    const pending = source.read(controller.signal);

    controller.abort('stop');

    await expect(pending).rejects.toBeInstanceOf(CancelledError);

    release();

    expect(textOf(await source.read())).toBe('late');
  });

  it('propagates errors thrown by the iterable unchanged', async () => {
    expect.hasAssertions();

    const error = new Error('transport failure');

    // eslint-disable-next-line require-yield
    async function* chunks(): AsyncGenerator<string> {
      throw error;
    }

    await expect(fromAsyncIterable(chunks()).read()).rejects.toBe(error);
  });

  it('adapts Node.js readable streams', async () => {
    expect.hasAssertions();

    const source = fromAsyncIterable(Readable.from([Buffer.from('x'), 'y']));

    expect(textOf(await source.read())).toBe('x');

    source.advanceTo(0, 1);

    expect(textOf(await source.read())).toBe('xy');
  });
});
