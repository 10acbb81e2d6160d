export type { DiscoveredPrinter, Endpoint, Sensor } from "./types.js";
export { toDiscoveredPrinter } from "./types.js";
export type { LocalAddressProvider } from "./local.js";
export { getLocalIPv4 } from "./local.js";
export type { PortProbe, ScanOptions, SubnetSensorOptions } from "./subnet.js";
export { DEFAULT_SCAN_TIMEOUT, probeTcpPort, scanSubnet, subnetOf, SubnetSensor } from "./subnet.js";
export type { AnnouncedService } from "./mdns.js";
export { MdnsSensor, printerFromService, RAW_PRINTER_SERVICE } from "./mdns.js";
export type { DiscoverOptions } from "./discover.js";
export { createSensors, discover, discoverPrinters } from "./discover.js";
