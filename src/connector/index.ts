export type { ConnectionStatus, ConnectorEvent, ConnectorOptions, LivenessSettings } from "./connector.js";
export { Connector, connectorOptionsFrom } from "./connector.js";
export type { StatusListener } from "./status.js";
export { StatusStream } from "./status.js";
