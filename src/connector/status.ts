import { errorMessage } from "../errors.js";
import log from "../logger.js";
import { Channel } from "../util/generator.js";

const scope = log.scope("status");

export type StatusListener<T> = (value: T) => void;

/**
 * Multi-subscriber stream of transitions. Every listener and every open
 * iterator sees every published value, in publish order. New subscribers
 * are not replayed the current value.
 */
export class StatusStream<T> implements AsyncIterable<T> {
  private readonly listeners = new Set<StatusListener<T>>();
  private readonly channels = new Set<Channel<T>>();
  private ended = false;

  constructor(private current: T) {}

  get value(): T {
    return this.current;
  }

  get closed(): boolean {
    return this.ended;
  }

  publish(value: T): void {
    this.current = value;

    for (const channel of this.channels) {
      channel.push(value);
    }

    for (const listener of Array.from(this.listeners)) {
      try {
        listener(value);
      } catch (error) {
        scope.error(`status listener failed: ${errorMessage(error)}`);
      }
    }
  }

  subscribe(listener: StatusListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Subscribes when the iterator is taken, not on its first `next()`. */
  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    const channel = new Channel<T>();
    if (this.ended) {
      channel.close();
    } else {
      this.channels.add(channel);
    }

    const values = channel[Symbol.asyncIterator]();
    const release = () => {
      this.channels.delete(channel);
      channel.close();
    };

    return {
      next: () => values.next(),
      return: (value?: unknown) => {
        release();
        return values.return(value);
      },
      [Symbol.asyncIterator]() {
        return this;
      },
    };
  }

  close(): void {
    this.ended = true;
    for (const channel of this.channels) {
      channel.close();
    }
    this.channels.clear();
    this.listeners.clear();
  }
}
