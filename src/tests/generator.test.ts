import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Channel, collect, mergeGenerators } from "../util/generator.js";

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    await Promise.resolve();
    yield item;
  }
}

describe("Channel", () => {
  it("delivers buffered values and then ends", async () => {
    const channel = new Channel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();

    expect(channel.push(3)).toBe(false);
    expect(await collect(channel)).toEqual([1, 2]);
  });

  it("wakes a consumer that is waiting", async () => {
    const channel = new Channel<string>();
    const items = collect(channel);

    setTimeout(() => {
      channel.push("a");
      channel.push("b");
      channel.close();
    }, 5);

    expect(await items).toEqual(["a", "b"]);
  });

  it("drains the buffer before rethrowing a failure", async () => {
    const channel = new Channel<number>();
    channel.push(1);
    channel.fail(new Error("scan crashed"));

    const seen: number[] = [];
    const consume = async () => {
      for await (const value of channel) {
        seen.push(value);
      }
    };

    await expect(consume()).rejects.toThrow("scan crashed");
    expect(seen).toEqual([1]);
  });
});

describe("mergeGenerators", () => {
  it("keeps every value and each source's order", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.integer()), fc.array(fc.integer()), async (left, right) => {
        const merged = await collect(
          mergeGenerators([
            fromArray(left.map((value) => ({ from: "left", value }))),
            fromArray(right.map((value) => ({ from: "right", value }))),
          ]),
        );

        expect(merged).toHaveLength(left.length + right.length);
        expect(merged.filter((item) => item.from === "left").map((item) => item.value)).toEqual(left);
        expect(merged.filter((item) => item.from === "right").map((item) => item.value)).toEqual(right);
      }),
    );
  });

  it("finishes the sources when the consumer stops early", async () => {
    let finished = false;
    async function* endless(): AsyncGenerator<number> {
      try {
        for (let i = 0; ; i++) {
          yield i;
        }
      } finally {
        finished = true;
      }
    }

    const seen: number[] = [];
    for await (const value of mergeGenerators([endless()])) {
      seen.push(value);
      if (value === 3) break;
    }

    expect(seen).toEqual([0, 1, 2, 3]);
    expect(finished).toBe(true);
  });

  it("ends immediately with no sources", async () => {
    expect(await collect(mergeGenerators<number>([]))).toEqual([]);
  });
});
