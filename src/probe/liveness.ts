import ping from "ping";
import { errorMessage } from "../errors.js";
import log from "../logger.js";
import { Channel } from "../util/generator.js";

const scope = log.scope("liveness");

export const DEFAULT_PROBE_INTERVAL = 3000;
export const DEFAULT_PROBE_TIMEOUT = 7000;

export type ProbeOutcome =
  | { address: string; alive: true; time?: number }
  | { address: string; alive: false; error: string };

export interface EchoReply {
  alive: boolean;
  time?: number;
}

export type EchoProbe = (address: string, timeout: number) => Promise<EchoReply>;

/** One ICMP echo through the system `ping`, which only takes whole seconds. */
export const icmpEcho: EchoProbe = async (address, timeout) => {
  const reply = await ping.promise.probe(address, { timeout: Math.max(1, Math.ceil(timeout / 1000)) });
  return {
    alive: reply.alive,
    time: typeof reply.time === "number" ? reply.time : undefined,
  };
};

export interface LivenessOptions {
  interval?: number;
  timeout?: number;
  echo?: EchoProbe;
}

/**
 * Periodic echo probes against one address. Probes may overlap when the
 * timeout is longer than the interval. Nothing is delivered after `stop()`.
 */
export class LivenessProber {
  private timer?: ReturnType<typeof setInterval>;
  private outcomes?: Channel<ProbeOutcome>;
  private readonly deadlines = new Set<ReturnType<typeof setTimeout>>();

  constructor(
    readonly address: string,
    private readonly options: LivenessOptions = {},
  ) {}

  get running(): boolean {
    return this.outcomes !== undefined;
  }

  start(): AsyncGenerator<ProbeOutcome> {
    this.stop();

    const outcomes = new Channel<ProbeOutcome>();
    this.outcomes = outcomes;

    this.probe(outcomes);
    this.timer = setInterval(() => this.probe(outcomes), this.options.interval ?? DEFAULT_PROBE_INTERVAL);

    return outcomes[Symbol.asyncIterator]();
  }

  /**
   * Ends the outcome stream. An echo already running is not cancelled: the
   * system `ping` it spawned exits on its own within the whole-second
   * timeout, and its result is dropped.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    for (const deadline of this.deadlines) {
      clearTimeout(deadline);
    }
    this.deadlines.clear();
    this.outcomes?.close();
    this.outcomes = undefined;
  }

  private probe(outcomes: Channel<ProbeOutcome>): void {
    const { address } = this;
    const timeout = this.options.timeout ?? DEFAULT_PROBE_TIMEOUT;
    const echo = this.options.echo ?? icmpEcho;

    let deadline: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<ProbeOutcome>((resolve) => {
      deadline = setTimeout(() => resolve({ address, alive: false, error: `no reply within ${timeout}ms` }), timeout);
      this.deadlines.add(deadline);
    });

    const replied = echo(address, timeout).then(
      (reply): ProbeOutcome =>
        reply.alive ? { address, alive: true, time: reply.time } : { address, alive: false, error: "no reply" },
      (error: unknown): ProbeOutcome => ({ address, alive: false, error: errorMessage(error) }),
    );

    void Promise.race([replied, expired]).then((outcome) => {
      if (deadline) {
        clearTimeout(deadline);
        this.deadlines.delete(deadline);
      }
      if (outcome.alive) {
        scope.silly(`${address} replied in ${outcome.time ?? "?"}ms`);
      } else if (!outcomes.closed) {
        scope.warn(`${address} probe failed: ${outcome.error}`);
      }
      outcomes.push(outcome);
    });
  }
}
