import log from "electron-log/node";
import type { LanprintConfig } from "./config.js";

// Library default: quiet console, no log file until configureLogging says otherwise.
log.transports.file.level = false;
log.transports.console.level = "warn";

export function configureLogging(config: Pick<LanprintConfig, "logLevel" | "logFile">): void {
  const level = config.logLevel === "off" ? false : config.logLevel;

  log.transports.console.level = level;

  const file = config.logFile;
  if (file) {
    log.transports.file.level = level;
    log.transports.file.resolvePathFn = () => file;
  } else {
    log.transports.file.level = false;
  }
}

export default log;
