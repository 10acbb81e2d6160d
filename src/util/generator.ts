type Pending<T> = Promise<{ it: AsyncIterator<T>; result: IteratorResult<T> }>;

/**
 * Interleaves several async sequences, yielding values in the order they
 * resolve. Each source keeps exactly one `next()` in flight, so nothing a
 * slower source produced is lost while a faster one wins the race.
 */
export async function* mergeGenerators<T>(generators: AsyncIterable<T>[]): AsyncGenerator<T> {
  const pending = new Map<AsyncIterator<T>, Pending<T>>();

  const pull = (it: AsyncIterator<T>) => {
    pending.set(
      it,
      it.next().then((result) => ({ it, result })),
    );
  };

  for (const generator of generators) {
    pull(generator[Symbol.asyncIterator]());
  }

  try {
    while (pending.size > 0) {
      const { it, result } = await Promise.race(pending.values());

      if (result.done) {
        pending.delete(it);
      } else {
        pull(it);
        yield result.value;
      }
    }
  } finally {
    await Promise.all(Array.from(pending.keys(), (it) => it.return?.()));
  }
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Single-consumer async queue. Producers `push` from callbacks; the consumer
 * iterates until `close` (or `fail`) is called and the buffer is drained.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private wake: Array<() => void> = [];
  private done = false;
  private failure?: { error: unknown };

  get closed(): boolean {
    return this.done;
  }

  push(value: T): boolean {
    if (this.done) {
      return false;
    }
    this.buffer.push(value);
    this.notify();
    return true;
  }

  close(): void {
    if (this.done) {
      return;
    }
    this.done = true;
    this.notify();
  }

  fail(error: unknown): void {
    if (this.done) {
      return;
    }
    this.failure = { error };
    this.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    for (;;) {
      if (this.buffer.length > 0) {
        const [value] = this.buffer.splice(0, 1);
        yield value;
        continue;
      }
      if (this.failure) {
        throw this.failure.error;
      }
      if (this.done) {
        return;
      }
      await new Promise<void>((resolve) => this.wake.push(resolve));
    }
  }

  private notify(): void {
    const waiting = this.wake;
    this.wake = [];
    for (const resolve of waiting) {
      resolve();
    }
  }
}
