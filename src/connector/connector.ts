import { isIPv4, type Socket } from "node:net";
import { DEFAULT_CONFIG, type LanprintConfig } from "../config.js";
import { PrinterError, errorMessage } from "../errors.js";
import log from "../logger.js";
import { LivenessProber, type EchoProbe, type ProbeOutcome } from "../probe/liveness.js";
import { discover, discoverPrinters, type DiscoverOptions } from "../sensor/discover.js";
import type { LocalAddressProvider } from "../sensor/local.js";
import type { DiscoveredPrinter, Endpoint } from "../sensor/types.js";
import { ConnectionSession } from "../session/session.js";
import type { SessionEvent, SessionResult } from "../session/types.js";
import { StatusStream } from "./status.js";

const scope = log.scope("connector");

export type ConnectionStatus = "none" | "connected";

/** Everything that can end a connection, funnelled into one decision point. */
export type ConnectorEvent =
  | SessionEvent
  | { type: "probe"; outcome: ProbeOutcome }
  | { type: "send-failed"; error: PrinterError };

export interface LivenessSettings {
  interval: number;
  timeout: number;
  echo?: EchoProbe;
}

export interface ConnectorOptions {
  port?: number;
  connectTimeout?: number;
  discoveryTimeout?: number;
  scanConcurrency?: number;
  /** `false` connects without liveness probing. */
  liveness?: LivenessSettings | false;
  localAddress?: LocalAddressProvider;
  createSocket?: () => Socket;
}

export function connectorOptionsFrom(config: LanprintConfig): ConnectorOptions {
  return {
    port: config.port,
    connectTimeout: config.connectTimeout,
    discoveryTimeout: config.discoveryTimeout,
    scanConcurrency: config.scanConcurrency,
    liveness: config.liveness.enabled
      ? { interval: config.liveness.interval, timeout: config.liveness.timeout }
      : false,
  };
}

/**
 * One managed connection to one printer. The session and its prober are
 * created together by `connect` and torn down together, exactly once, by
 * whichever of disconnect, send failure, socket close, socket error or
 * probe failure comes first.
 */
export class Connector {
  readonly statusStream = new StatusStream<ConnectionStatus>("none");

  private session?: ConnectionSession;
  private prober?: LivenessProber;
  private target?: Endpoint;
  private connecting = false;
  private closing?: Promise<void>;
  private attempt = 0;
  private error?: PrinterError;

  constructor(private readonly options: ConnectorOptions = {}) {}

  get status(): ConnectionStatus {
    return this.statusStream.value;
  }

  get endpoint(): Endpoint | undefined {
    return this.target;
  }

  get lastError(): PrinterError | undefined {
    return this.error;
  }

  discover(options: DiscoverOptions = {}): AsyncGenerator<DiscoveredPrinter> {
    return discover(this.discoverOptions(options));
  }

  discoverPrinters(options: DiscoverOptions = {}): Promise<DiscoveredPrinter[]> {
    return discoverPrinters(this.discoverOptions(options));
  }

  async connect(
    address: string,
    port: number = this.options.port ?? DEFAULT_CONFIG.port,
    timeout: number = this.options.connectTimeout ?? DEFAULT_CONFIG.connectTimeout,
  ): Promise<boolean> {
    if (this.status !== "none" || this.connecting || this.closing) {
      return this.reject(new PrinterError("AlreadyConnected", `Already connected or connecting`));
    }
    if (!isIPv4(address) || !Number.isInteger(port) || port < 1 || port > 65535) {
      return this.reject(new PrinterError("InvalidAddress", `Invalid printer endpoint ${address}:${port}`));
    }

    const endpoint: Endpoint = { address, port };
    const attempt = ++this.attempt;
    const session: ConnectionSession = new ConnectionSession((event) => {
      if (this.session === session) {
        this.handle(event);
      }
    }, this.options.createSocket);

    this.connecting = true;
    let result: SessionResult;
    try {
      result = await session.open(endpoint, timeout);
    } finally {
      this.connecting = false;
    }

    if (!result.ok) {
      scope.warn(`connect to ${address}:${port} failed: ${result.error.message}`);
      return this.reject(result.error);
    }
    if (attempt !== this.attempt) {
      session.destroy();
      return this.reject(new PrinterError("ConnectAborted", `Connect to ${address}:${port} was cancelled`));
    }

    this.session = session;
    this.target = endpoint;
    this.error = undefined;
    this.statusStream.publish("connected");
    this.startProber(address);

    return true;
  }

  async send(bytes: Uint8Array): Promise<boolean> {
    const session = this.session;
    if (this.status !== "connected" || this.closing || !session) {
      return this.reject(new PrinterError("NotConnected", "Not connected to a printer"));
    }

    const result = await session.send(bytes);
    if (!result.ok) {
      this.error = result.error;
      if (this.session === session) {
        this.handle({ type: "send-failed", error: result.error });
      }
      return false;
    }
    return true;
  }

  /**
   * Stops probing and destroys the socket at once; the `none` status is
   * published only after `delayMs`.
   */
  async disconnect(delayMs?: number): Promise<boolean> {
    // Cancels an attempt still in flight.
    this.attempt++;

    if (this.closing) {
      await this.closing;
      return true;
    }

    if (this.status !== "connected") {
      this.release();
      return true;
    }

    scope.info(`disconnecting from ${this.describeTarget()}`);
    const session = this.session;
    this.stopProber();
    this.closing = (session ? session.close(delayMs) : Promise.resolve()).then(() => {
      this.release();
      this.closing = undefined;
      this.statusStream.publish("none");
    });

    await this.closing;
    return true;
  }

  async dispose(): Promise<void> {
    await this.disconnect();
    this.statusStream.close();
  }

  private handle(event: ConnectorEvent): void {
    switch (event.type) {
      case "data":
        return;
      case "probe":
        if (event.outcome.alive) return;
        this.teardown(new PrinterError("ProbeFailure", `${event.outcome.address} stopped answering: ${event.outcome.error}`));
        return;
      case "closed":
        this.teardown(new PrinterError("SocketClosedByPeer", `${this.describeTarget()} closed the connection`));
        return;
      case "error":
        this.teardown(
          new PrinterError("SocketClosedByPeer", `Socket error on ${this.describeTarget()}: ${event.error.message}`, {
            cause: event.error,
          }),
        );
        return;
      case "send-failed":
        this.teardown(event.error);
        return;
    }
  }

  /** Runs without suspending, so a second cause finds status already `none`. */
  private teardown(reason: PrinterError): void {
    if (this.status !== "connected" || this.closing) {
      return;
    }

    scope.warn(`connection lost (${reason.code}): ${reason.message}`);
    this.error = reason;
    this.release();
    this.statusStream.publish("none");
  }

  private release(): void {
    this.stopProber();
    this.session?.destroy();
    this.session = undefined;
    this.target = undefined;
  }

  private startProber(address: string): void {
    const settings = this.options.liveness ?? {
      interval: DEFAULT_CONFIG.liveness.interval,
      timeout: DEFAULT_CONFIG.liveness.timeout,
    };
    if (settings === false) {
      return;
    }

    const prober = new LivenessProber(address, settings);
    this.prober = prober;

    this.watch(prober).catch((error: unknown) => {
      scope.error(`liveness watcher failed: ${errorMessage(error)}`);
    });
  }

  private async watch(prober: LivenessProber): Promise<void> {
    for await (const outcome of prober.start()) {
      if (this.prober !== prober) {
        return;
      }
      this.handle({ type: "probe", outcome });
    }
  }

  private stopProber(): void {
    this.prober?.stop();
    this.prober = undefined;
  }

  private reject(error: PrinterError): false {
    this.error = error;
    return false;
  }

  private describeTarget(): string {
    return this.target ? `${this.target.address}:${this.target.port}` : "printer";
  }

  private discoverOptions(options: DiscoverOptions): DiscoverOptions {
    return {
      port: this.options.port,
      timeout: this.options.discoveryTimeout,
      concurrency: this.options.scanConcurrency,
      localAddress: this.options.localAddress,
      ...options,
    };
  }
}
