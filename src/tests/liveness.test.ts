import { afterEach, describe, expect, it, vi } from "vitest";
import { LivenessProber, type EchoProbe } from "../probe/liveness.js";
import { sleep } from "./helpers.js";

describe("LivenessProber", () => {
  let prober: LivenessProber | undefined;

  afterEach(() => {
    prober?.stop();
    prober = undefined;
  });

  it("probes at once and then on every interval", async () => {
    const echo = vi.fn<EchoProbe>(async () => ({ alive: true, time: 1 }));
    prober = new LivenessProber("10.0.0.9", { interval: 20, timeout: 100, echo });

    const outcomes = prober.start();
    expect(echo).toHaveBeenCalledTimes(1);
    expect(echo).toHaveBeenCalledWith("10.0.0.9", 100);

    expect((await outcomes.next()).value).toEqual({ address: "10.0.0.9", alive: true, time: 1 });
    expect((await outcomes.next()).value).toEqual({ address: "10.0.0.9", alive: true, time: 1 });
    expect(echo.mock.calls.length).toBeGreaterThanOrEqual(2);
    expect(prober.running).toBe(true);
  });

  it("reports a missing reply", async () => {
    prober = new LivenessProber("10.0.0.9", { interval: 1000, echo: async () => ({ alive: false }) });

    expect((await prober.start().next()).value).toEqual({ address: "10.0.0.9", alive: false, error: "no reply" });
  });

  it("gives up on a probe after the timeout", async () => {
    const silent: EchoProbe = () => new Promise(() => undefined);
    prober = new LivenessProber("10.0.0.9", { interval: 1000, timeout: 20, echo: silent });

    expect((await prober.start().next()).value).toEqual({
      address: "10.0.0.9",
      alive: false,
      error: "no reply within 20ms",
    });
  });

  it("turns a failing echo into a failed outcome", async () => {
    const broken: EchoProbe = async () => {
      throw new Error("ping: not permitted");
    };
    prober = new LivenessProber("10.0.0.9", { interval: 1000, echo: broken });

    expect((await prober.start().next()).value).toEqual({
      address: "10.0.0.9",
      alive: false,
      error: "ping: not permitted",
    });
  });

  it("delivers nothing after stop", async () => {
    const echo = vi.fn<EchoProbe>(async () => {
      await sleep(10);
      return { alive: false };
    });
    prober = new LivenessProber("10.0.0.9", { interval: 20, echo });

    const outcomes = prober.start();
    prober.stop();

    expect(await outcomes.next()).toEqual({ done: true, value: undefined });
    await sleep(60);
    expect(echo).toHaveBeenCalledTimes(1);
    expect(prober.running).toBe(false);
  });

  it("restarts with a fresh stream", async () => {
    prober = new LivenessProber("10.0.0.9", { interval: 1000, echo: async () => ({ alive: true }) });

    const first = prober.start();
    const second = prober.start();

    expect(await first.next()).toEqual({ done: true, value: undefined });
    expect((await second.next()).value).toEqual({ address: "10.0.0.9", alive: true, time: undefined });
  });
});
