import { loadConfig, type LanprintConfig } from "../config.js";
import { configureLogging } from "../logger.js";
import type { DiscoveredPrinter } from "../sensor/types.js";

export async function loadCliConfig(): Promise<LanprintConfig> {
  const config = await loadConfig();
  configureLogging(config);
  return config;
}

export function requireOption(name: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`--${name} is required`);
  }
  return value;
}

export function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`--${name} expects a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

export function formatPrinter(printer: DiscoveredPrinter): string {
  return `${printer.endpoint.address}\t${printer.endpoint.port}\t${printer.source}`;
}
