import { collect, mergeGenerators } from "../util/generator.js";
import type { LocalAddressProvider } from "./local.js";
import { MdnsSensor } from "./mdns.js";
import { DEFAULT_SCAN_TIMEOUT, SubnetSensor, subnetOf, type PortProbe } from "./subnet.js";
import type { DiscoveredPrinter, Sensor } from "./types.js";

export interface DiscoverOptions {
  /** Any address on the subnet to scan. Defaults to this machine's address. */
  address?: string;
  port?: number;
  timeout?: number;
  concurrency?: number;
  /** Also browse mDNS for raw printing services. */
  mdns?: boolean;
  localAddress?: LocalAddressProvider;
  probe?: PortProbe;
}

export function createSensors(options: DiscoverOptions = {}): Sensor[] {
  if (options.address !== undefined) {
    // Throws InvalidAddress before any sensor opens a socket.
    subnetOf(options.address);
  }

  const sensors: Sensor[] = [
    new SubnetSensor({
      address: options.address,
      port: options.port,
      concurrency: options.concurrency,
      localAddress: options.localAddress,
      probe: options.probe,
    }),
  ];

  if (options.mdns) {
    sensors.push(new MdnsSensor());
  }

  return sensors;
}

/**
 * Printers as they are found. Each call scans afresh; duplicates across
 * sensors are dropped within the call only.
 */
export async function* discover(options: DiscoverOptions = {}): AsyncGenerator<DiscoveredPrinter> {
  const sensors = createSensors(options);
  const timeout = options.timeout ?? DEFAULT_SCAN_TIMEOUT;
  const seen = new Set<string>();

  const merged = mergeGenerators(sensors.map((sensor) => sensor.discover(timeout)));

  try {
    for (;;) {
      const next = await merged.next();
      if (next.done) {
        return;
      }
      if (seen.has(next.value.displayName)) {
        continue;
      }
      seen.add(next.value.displayName);
      yield next.value;
    }
  } finally {
    // Sensors must stop before the merge is finished: its pending reads only
    // settle once the scans behind them end.
    for (const sensor of sensors) {
      sensor.stop?.();
    }
    await merged.return(undefined);
  }
}

export function discoverPrinters(options: DiscoverOptions = {}): Promise<DiscoveredPrinter[]> {
  return collect(discover(options));
}
