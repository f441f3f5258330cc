import debugFactory from 'debug';

const debug = debugFactory('json-array-streamer:buffer-pool');

/**
 * A reusable output buffer borrowed from a {@link BufferPool}. `capacity` is
 * the physical size of the buffer while `items.length` is the number of items
 * currently held in it.
 */
export type PooledBuffer<T> = {
  readonly items: T[];
  readonly capacity: number;
  readonly isFull: boolean;
  /**
   * Drops every item so the buffer no longer references them.
   */
  clear(): void;
};

/**
 * Options used to configure a {@link BufferPool}.
 */
export type BufferPoolOptions = {
  /**
   * The maximum number of idle buffers retained for each capacity. Buffers
   * released into a full bucket are left for garbage collection.
   *
   * @default 16
   */
  maxBuffersPerBucket?: number;
};

/**
 * A pool of {@link PooledBuffer}s bucketed by power-of-two capacity.
 */
export class BufferPool<T> {
  protected readonly maxBuffersPerBucket: number;
  protected readonly buckets = new Map<number, PooledBuffer<T>[]>();
  protected readonly borrowed = new Set<PooledBuffer<T>>();

  constructor({ maxBuffersPerBucket = 16 }: BufferPoolOptions = {}) {
    if (!Number.isInteger(maxBuffersPerBucket) || maxBuffersPerBucket < 0) {
      throw new RangeError(
        `maxBuffersPerBucket must be a non-negative integer, saw: ${maxBuffersPerBucket}`
      );
    }

    this.maxBuffersPerBucket = maxBuffersPerBucket;
  }

  /**
   * The number of buffers currently borrowed from this pool.
   */
  get outstanding() {
    return this.borrowed.size;
  }

  /**
   * The number of idle buffers held by this pool.
   */
  get available() {
    let count = 0;

    for (const bucket of this.buckets.values()) {
      count += bucket.length;
    }

    return count;
  }

  /**
   * Borrows an empty buffer with a capacity of at least `minimumCapacity`,
   * rounded up to the next power of two.
   */
  acquire(minimumCapacity: number): PooledBuffer<T> {
    if (!Number.isInteger(minimumCapacity) || minimumCapacity < 1) {
      throw new RangeError(
        `buffer capacity must be a positive integer, saw: ${minimumCapacity}`
      );
    }

    const capacity = nextPowerOfTwo(minimumCapacity);
    const buffer = this.buckets.get(capacity)?.pop() ?? createBuffer<T>(capacity);

    this.borrowed.add(buffer);
    return buffer;
  }

  /**
   * Borrows a buffer with double the capacity of `buffer`, moves the items of
   * `buffer` into it, and releases `buffer` back into the pool.
   */
  grow(buffer: PooledBuffer<T>): PooledBuffer<T> {
    this.assertBorrowed(buffer);

    const grown = this.acquire(buffer.capacity * 2);

    for (const item of buffer.items) {
      grown.items.push(item);
    }

    debug('grew buffer from %O to %O', buffer.capacity, grown.capacity);

    this.release(buffer);
    return grown;
  }

  /**
   * Clears `buffer` and returns it to the pool. Each borrowed buffer must be
   * released exactly once.
   */
  release(buffer: PooledBuffer<T>): void {
    this.assertBorrowed(buffer);

    this.borrowed.delete(buffer);
    buffer.clear();

    const bucket = this.buckets.get(buffer.capacity) ?? [];

    if (bucket.length < this.maxBuffersPerBucket) {
      bucket.push(buffer);
      this.buckets.set(buffer.capacity, bucket);
    }
  }

  protected assertBorrowed(buffer: PooledBuffer<T>) {
    if (!this.borrowed.has(buffer)) {
      throw new Error('buffer is not currently borrowed from this pool');
    }
  }
}

function createBuffer<T>(capacity: number): PooledBuffer<T> {
  const items: T[] = [];

  return {
    items,
    capacity,
    get isFull() {
      return items.length >= capacity;
    },
    clear() {
      items.length = 0;
    }
  };
}

function nextPowerOfTwo(value: number) {
  let power = 1;

  while (power < value) {
    power *= 2;
  }

  return power;
}
