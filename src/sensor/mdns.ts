import { isIPv4 } from "node:net";
import { Bonjour } from "bonjour-service";
import log from "../logger.js";
import { Channel } from "../util/generator.js";
import { toDiscoveredPrinter, type DiscoveredPrinter, type Sensor } from "./types.js";

const scope = log.scope("mdns");

/** Raw port-9100 printers announce themselves as `_pdl-datastream._tcp`. */
export const RAW_PRINTER_SERVICE = "pdl-datastream";

/** The parts of a bonjour `Service` a printer is built from. */
export interface AnnouncedService {
  name: string;
  port: number;
  addresses?: string[];
  referer?: { address: string };
}

export function printerFromService(service: AnnouncedService): DiscoveredPrinter | undefined {
  const address = service.addresses?.find((candidate) => isIPv4(candidate)) ?? service.referer?.address;
  if (!address || !isIPv4(address) || !service.port) {
    return undefined;
  }
  return toDiscoveredPrinter({ address, port: service.port }, "mdns");
}

export class MdnsSensor implements Sensor {
  private bonjour?: Bonjour;
  private found?: Channel<DiscoveredPrinter>;

  constructor(private readonly type: string = RAW_PRINTER_SERVICE) {}

  async *discover(timeout = 4000): AsyncGenerator<DiscoveredPrinter> {
    const bonjour = new Bonjour();
    this.bonjour = bonjour;

    const found = new Channel<DiscoveredPrinter>();
    this.found = found;
    const browser = bonjour.find({ type: this.type, protocol: "tcp" }, (service) => {
      const printer = printerFromService(service);
      if (printer) {
        scope.debug(`${service.name} at ${printer.displayName}`);
        found.push(printer);
      }
    });

    const timer = setTimeout(() => found.close(), timeout);

    try {
      yield* found;
    } finally {
      clearTimeout(timer);
      browser.stop();
      if (this.bonjour === bonjour) {
        this.stop();
      }
    }
  }

  stop(): void {
    this.found?.close();
    this.found = undefined;
    if (this.bonjour) {
      this.bonjour.destroy();
      this.bonjour = undefined;
    }
  }
}
