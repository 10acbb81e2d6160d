import { access, readFile } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { boolean, number, object, string, ValidationError, type InferType } from "yup";
import { PrinterError, errorMessage } from "./errors.js";

export const DEFAULT_PORT = 9100;

export const LOG_LEVELS = ["off", "error", "warn", "info", "verbose", "debug", "silly"] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const configSchema = object({
  port: number().integer().min(1).max(65535).default(DEFAULT_PORT),
  discoveryTimeout: number().integer().positive().default(4000),
  connectTimeout: number().integer().positive().default(5000),
  scanConcurrency: number().integer().min(1).max(254).default(254),
  mdns: boolean().default(false),
  liveness: object({
    enabled: boolean().default(true),
    interval: number().integer().positive().default(3000),
    timeout: number().integer().positive().default(7000),
  }),
  logLevel: string().oneOf(LOG_LEVELS).default("warn"),
  logFile: string().optional(),
});

export type LanprintConfig = InferType<typeof configSchema>;

export const DEFAULT_CONFIG: LanprintConfig = configSchema.validateSync({});

export function getConfigPath(): string {
  const override = process.env.LANPRINT_CONFIG;
  if (override) {
    return override;
  }
  return join(homedir(), ".config", "lanprint", "config.json");
}

async function readConfigFile(path: string): Promise<object | undefined> {
  try {
    await access(path);
  } catch {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new PrinterError("InvalidConfig", `Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new PrinterError("InvalidConfig", `${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Loads the configuration file over the defaults. A missing file is not an
 * error; `LANPRINT_LOG_LEVEL` wins over the file's `logLevel`.
 */
export async function loadConfig(path: string = getConfigPath()): Promise<LanprintConfig> {
  const fromFile = (await readConfigFile(path)) ?? {};
  const logLevel = process.env.LANPRINT_LOG_LEVEL;
  const raw = logLevel ? { ...fromFile, logLevel } : fromFile;

  try {
    return await configSchema.validate(raw, { stripUnknown: true });
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new PrinterError("InvalidConfig", `Invalid configuration in ${path}: ${error.errors.join("; ")}`, {
        cause: error,
      });
    }
    throw error;
  }
}
