import { setMaxListeners } from "node:events";
import { Socket, isIPv4 } from "node:net";
import { DEFAULT_PORT } from "../config.js";
import { PrinterError } from "../errors.js";
import log from "../logger.js";
import { Channel } from "../util/generator.js";
import { getLocalIPv4, type LocalAddressProvider } from "./local.js";
import { toDiscoveredPrinter, type DiscoveredPrinter, type Endpoint, type Sensor } from "./types.js";

const scope = log.scope("scanner");

export const DEFAULT_SCAN_TIMEOUT = 4000;
const HOSTS_PER_SUBNET = 254;

export type PortProbe = (address: string, port: number, timeout: number, signal?: AbortSignal) => Promise<boolean>;

export interface ScanOptions {
  port?: number;
  timeout?: number;
  /** Attempts in flight at once, 1..254. */
  concurrency?: number;
  probe?: PortProbe;
  signal?: AbortSignal;
}

const PREFIX_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

function assertPrefix(prefix: string): void {
  const match = PREFIX_PATTERN.exec(prefix);
  if (!match || match.slice(1).some((octet) => parseInt(octet, 10) > 255)) {
    throw new PrinterError("InvalidAddress", `Not a /24 prefix: "${prefix}"`);
  }
}

export function subnetOf(address: string): string {
  if (!isIPv4(address)) {
    throw new PrinterError("InvalidAddress", `Not an IPv4 address: "${address}"`);
  }
  return address.slice(0, address.lastIndexOf("."));
}

/**
 * Resolves true when a TCP connection to `address:port` is accepted within
 * `timeout` ms. Refusals, timeouts and aborts resolve false.
 */
export function probeTcpPort(address: string, port: number, timeout: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const socket = new Socket();
    let settled = false;

    const finish = (open: boolean) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      socket.destroy();
      resolve(open);
    };

    const onAbort = () => finish(false);
    const timer = setTimeout(() => finish(false), timeout);

    signal?.addEventListener("abort", onAbort, { once: true });
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
    socket.connect(port, address);
  });
}

/**
 * Probes `prefix.1` through `prefix.254` and yields every endpoint that
 * accepted a connection, in completion order. Leaving the loop early aborts
 * the attempts still in flight.
 */
export async function* scanSubnet(prefix: string, options: ScanOptions = {}): AsyncGenerator<Endpoint> {
  assertPrefix(prefix);

  const port = options.port ?? DEFAULT_PORT;
  const timeout = options.timeout ?? DEFAULT_SCAN_TIMEOUT;
  const probe = options.probe ?? probeTcpPort;
  const workers = Math.min(Math.max(options.concurrency ?? HOSTS_PER_SUBNET, 1), HOSTS_PER_SUBNET);

  const controller = new AbortController();
  // Every attempt in flight listens on this one signal.
  setMaxListeners(HOSTS_PER_SUBNET, controller.signal);
  const onAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  }
  options.signal?.addEventListener("abort", onAbort, { once: true });

  const results = new Channel<Endpoint>();
  let nextHost = 1;

  const worker = async () => {
    while (nextHost <= HOSTS_PER_SUBNET && !controller.signal.aborted) {
      const address = `${prefix}.${nextHost++}`;
      if (await probe(address, port, timeout, controller.signal)) {
        scope.debug(`open ${address}:${port}`);
        results.push({ address, port });
      }
    }
  };

  scope.info(`scanning ${prefix}.0/24 on port ${port} (${workers} at a time, ${timeout}ms timeout)`);

  void Promise.all(Array.from({ length: workers }, worker)).then(
    () => results.close(),
    (error: unknown) => results.fail(error),
  );

  try {
    yield* results;
  } finally {
    controller.abort();
    options.signal?.removeEventListener("abort", onAbort);
  }
}

export interface SubnetSensorOptions extends Omit<ScanOptions, "timeout" | "signal"> {
  /** Any address on the subnet to scan; the local address when absent. */
  address?: string;
  localAddress?: LocalAddressProvider;
}

export class SubnetSensor implements Sensor {
  private controller?: AbortController;

  constructor(private readonly options: SubnetSensorOptions = {}) {}

  async *discover(timeout?: number): AsyncGenerator<DiscoveredPrinter> {
    const address = this.options.address ?? (await (this.options.localAddress ?? getLocalIPv4)());
    if (!address) {
      scope.warn("no local IPv4 address, nothing to scan");
      return;
    }

    const controller = new AbortController();
    this.controller = controller;

    try {
      for await (const endpoint of scanSubnet(subnetOf(address), {
        ...this.options,
        timeout,
        signal: controller.signal,
      })) {
        yield toDiscoveredPrinter(endpoint, "subnet");
      }
    } finally {
      if (this.controller === controller) {
        this.controller = undefined;
      }
    }
  }

  stop(): void {
    this.controller?.abort();
  }
}
