import { Socket } from "node:net";
import { PrinterError, errorMessage } from "../errors.js";
import log from "../logger.js";
import type { Endpoint } from "../sensor/types.js";
import type { SessionListener, SessionResult } from "./types.js";

const scope = log.scope("session");

const OK: SessionResult = { ok: true };

function failure(error: PrinterError): SessionResult {
  return { ok: false, error };
}

/**
 * Owns at most one TCP socket. Reports what happens on it through the
 * listener but never decides what that means for the connection.
 */
export class ConnectionSession {
  private socket?: Socket;

  constructor(
    private readonly listener: SessionListener,
    private readonly createSocket: () => Socket = () => new Socket(),
  ) {}

  get isOpen(): boolean {
    return this.socket !== undefined && !this.socket.destroyed;
  }

  open(endpoint: Endpoint, timeout: number): Promise<SessionResult> {
    const target = `${endpoint.address}:${endpoint.port}`;

    if (this.socket) {
      return Promise.resolve(failure(new PrinterError("AlreadyConnected", `Session already open`)));
    }

    return new Promise((resolve) => {
      const socket = this.createSocket();

      const timer = setTimeout(() => {
        socket.removeListener("error", onError);
        socket.destroy();
        resolve(failure(new PrinterError("ConnectTimeout", `Timed out after ${timeout}ms connecting to ${target}`)));
      }, timeout);

      const onError = (error: Error) => {
        clearTimeout(timer);
        socket.destroy();
        resolve(failure(PrinterError.fromSocketError(error, target)));
      };

      socket.once("error", onError);
      socket.once("connect", () => {
        clearTimeout(timer);
        socket.removeListener("error", onError);
        this.attach(socket);
        scope.info(`connected to ${target}`);
        resolve(OK);
      });

      socket.connect(endpoint.port, endpoint.address);
    });
  }

  send(bytes: Uint8Array): Promise<SessionResult> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.resolve(failure(new PrinterError("NotConnected", "No open socket")));
    }

    return new Promise((resolve) => {
      const fail = (error: Error) => {
        if (this.socket === socket) {
          this.destroy();
          this.listener({ type: "error", error });
        }
        resolve(failure(new PrinterError("WriteFailure", `Write failed: ${error.message}`, { cause: error })));
      };

      try {
        socket.write(bytes, (error) => {
          if (error) {
            fail(error);
          } else {
            scope.debug(`wrote ${bytes.byteLength} bytes`);
            resolve(OK);
          }
        });
      } catch (error) {
        fail(error instanceof Error ? error : new Error(errorMessage(error)));
      }
    });
  }

  /** Forced and idempotent; events of the destroyed socket are not reported. */
  destroy(): void {
    const socket = this.socket;
    this.socket = undefined;
    socket?.destroy();
  }

  async close(lingerMs?: number): Promise<void> {
    this.destroy();
    if (lingerMs !== undefined && lingerMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, lingerMs));
    }
  }

  private attach(socket: Socket): void {
    this.socket = socket;

    socket.on("data", (chunk: Buffer) => {
      if (this.socket !== socket) return;
      scope.silly(`received ${chunk.length} bytes`);
      this.listener({ type: "data", chunk });
    });

    socket.on("error", (error: Error) => {
      if (this.socket !== socket) return;
      scope.warn(`socket error: ${error.message}`);
      this.listener({ type: "error", error });
    });

    socket.on("close", (hadError: boolean) => {
      if (this.socket !== socket) return;
      this.socket = undefined;
      scope.info("socket closed by peer");
      this.listener({ type: "closed", hadError });
    });
  }
}
