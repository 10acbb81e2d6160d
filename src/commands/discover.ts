import { define } from "gunshi";
import { Connector, connectorOptionsFrom } from "../connector/connector.js";
import { formatPrinter, loadCliConfig, parseInteger } from "./options.js";

export const discover = define({
  name: "discover",
  description: "Scan the local /24 subnet for printers accepting raw TCP jobs",
  args: {
    address: {
      type: "string",
      short: "a",
      description: "Any address on the subnet to scan (defaults to this machine's)",
    },
    port: {
      type: "string",
      short: "p",
      description: "TCP port to probe (default 9100)",
    },
    timeout: {
      type: "string",
      short: "t",
      description: "Per-host timeout in milliseconds (default 4000)",
    },
    mdns: {
      type: "boolean",
      short: "m",
      description: "Also browse mDNS for _pdl-datastream._tcp services",
    },
  },
  async run(ctx) {
    const config = await loadCliConfig();
    const connector = new Connector(connectorOptionsFrom(config));

    console.log("address\tport\tsource");

    for await (const printer of connector.discover({
      address: ctx.values.address,
      port: parseInteger("port", ctx.values.port),
      timeout: parseInteger("timeout", ctx.values.timeout),
      mdns: ctx.values.mdns ?? config.mdns,
    })) {
      console.log(formatPrinter(printer));
    }
  },
});
