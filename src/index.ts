export type { LanprintConfig, LogLevelName } from "./config.js";
export { DEFAULT_CONFIG, DEFAULT_PORT, getConfigPath, loadConfig } from "./config.js";
export type { PrinterErrorCode } from "./errors.js";
export { PrinterError } from "./errors.js";
export { configureLogging } from "./logger.js";
export * from "./sensor/index.js";
export * from "./session/index.js";
export * from "./connector/index.js";
export type { EchoProbe, EchoReply, LivenessOptions, ProbeOutcome } from "./probe/liveness.js";
export { DEFAULT_PROBE_INTERVAL, DEFAULT_PROBE_TIMEOUT, icmpEcho, LivenessProber } from "./probe/liveness.js";
export { Channel, collect, mergeGenerators } from "./util/generator.js";
