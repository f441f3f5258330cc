import { BufferPool } from 'multiverse/buffer-pool';

describe('::BufferPool', () => {
  it('rounds requested capacities up to a power of two', async () => {
    expect.hasAssertions();

    const pool = new BufferPool<number>();

    expect(pool.acquire(1).capacity).toBe(1);
    expect(pool.acquire(3).capacity).toBe(4);
    expect(pool.acquire(32).capacity).toBe(32);
    expect(pool.acquire(33).capacity).toBe(64);
    expect(pool.outstanding).toBe(4);
  });

  it('rejects capacities that are not positive integers', async () => {
    expect.hasAssertions();

    const pool = new BufferPool<number>();

    expect(() => pool.acquire(0)).toThrow(RangeError);
    expect(() => pool.acquire(-2)).toThrow(RangeError);
    expect(() => pool.acquire(1.5)).toThrow(RangeError);
    expect(() => new BufferPool({ maxBuffersPerBucket: -1 })).toThrow(RangeError);
  });

  it('reuses released buffers of the same capacity', async () => {
    expect.hasAssertions();

    const pool = new BufferPool<number>();
    const buffer = pool.acquire(8);

    buffer.items.push(1, 2, 3);
    pool.release(buffer);

    expect(pool.outstanding).toBe(0);
    expect(pool.available).toBe(1);
    expect(buffer.items).toStrictEqual([]);

    const reused = pool.acquire(5);

    expect(reused).toBe(buffer);
    expect(reused.items).toStrictEqual([]);
    expect(pool.available).toBe(0);
  });

  it('reports when a buffer is full', async () => {
    expect.hasAssertions();

    const pool = new BufferPool<string>();
    const buffer = pool.acquire(2);

    expect(buffer.isFull).toBeFalse();
    buffer.items.push('a');
    expect(buffer.isFull).toBeFalse();
    buffer.items.push('b');
    expect(buffer.isFull).toBeTrue();
  });

  it('grows a buffer by doubling its capacity and keeping its items', async () => {
    expect.hasAssertions();

    const pool = new BufferPool<string>();
    const buffer = pool.acquire(2);

    buffer.items.push('a', 'b');

    const grown = pool.grow(buffer);

    expect(grown.capacity).toBe(4);
    expect(grown.items).toStrictEqual(['a', 'b']);
    expect(grown.isFull).toBeFalse();
    expect(buffer.items).toStrictEqual([]);
    expect(pool.outstanding).toBe(1);
    expect(pool.available).toBe(1);
  });

  it('throws when releasing a buffer twice or one it never lent', async () => {
    expect.hasAssertions();

    const pool = new BufferPool<number>();
    const otherPool = new BufferPool<number>();
    const buffer = pool.acquire(4);

    expect(() => otherPool.release(buffer)).toThrow('not currently borrowed');

    pool.release(buffer);

    expect(() => pool.release(buffer)).toThrow('not currently borrowed');
    expect(() => pool.grow(buffer)).toThrow('not currently borrowed');
  });

  it('retains at most maxBuffersPerBucket idle buffers per capacity', async () => {
    expect.hasAssertions();

    const pool = new BufferPool<number>({ maxBuffersPerBucket: 2 });
    const buffers = [pool.acquire(4), pool.acquire(4), pool.acquire(4), pool.acquire(8)];

    buffers.forEach((buffer) => pool.release(buffer));

    expect(pool.outstanding).toBe(0);
    expect(pool.available).toBe(3);
  });
});
