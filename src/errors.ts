export type PrinterErrorCode =
  | "ConnectTimeout"
  | "ConnectRefused"
  | "NetworkUnreachable"
  | "ConnectAborted"
  | "AlreadyConnected"
  | "NotConnected"
  | "WriteFailure"
  | "SocketClosedByPeer"
  | "ProbeFailure"
  | "InvalidAddress"
  | "InvalidConfig";

export class PrinterError extends Error {
  readonly code: PrinterErrorCode;

  constructor(code: PrinterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PrinterError";
    this.code = code;
  }

  static fromSocketError(error: Error, target: string): PrinterError {
    const errno = "code" in error && typeof error.code === "string" ? error.code : undefined;

    switch (errno) {
      case "ECONNREFUSED":
        return new PrinterError("ConnectRefused", `Connection refused by ${target}`, { cause: error });
      case "ETIMEDOUT":
        return new PrinterError("ConnectTimeout", `Timed out connecting to ${target}`, { cause: error });
      default:
        return new PrinterError(
          "NetworkUnreachable",
          `Cannot reach ${target}: ${errno ?? error.message}`,
          { cause: error },
        );
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
