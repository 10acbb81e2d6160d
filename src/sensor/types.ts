export interface Endpoint {
  readonly address: string;
  readonly port: number;
}

export interface DiscoveredPrinter {
  /** `address:port` */
  displayName: string;
  endpoint: Endpoint;
  source: "subnet" | "mdns";
}

export interface Sensor {
  discover(timeout?: number): AsyncGenerator<DiscoveredPrinter>;
  stop?(): void;
}

export function toDiscoveredPrinter(endpoint: Endpoint, source: DiscoveredPrinter["source"]): DiscoveredPrinter {
  return {
    displayName: `${endpoint.address}:${endpoint.port}`,
    endpoint,
    source,
  };
}
