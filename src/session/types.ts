import type { PrinterError } from "../errors.js";

export type SessionEvent =
  | { type: "data"; chunk: Buffer }
  | { type: "closed"; hadError: boolean }
  | { type: "error"; error: Error };

export type SessionResult = { ok: true } | { ok: false; error: PrinterError };

export type SessionListener = (event: SessionEvent) => void;
