import { define } from "gunshi";
import { Connector, connectorOptionsFrom, type ConnectionStatus } from "../connector/connector.js";
import { loadCliConfig, parseInteger, requireOption } from "./options.js";

export function formatStatus(status: ConnectionStatus, at: Date = new Date()): string {
  return `${at.toISOString()}\t${status}`;
}

export const watch = define({
  name: "watch",
  description: "Connect to a printer and report status changes until it drops",
  args: {
    host: {
      type: "string",
      short: "H",
      required: true,
      description: "Printer IPv4 address",
    },
    port: {
      type: "string",
      short: "p",
      description: "Printer port (default 9100)",
    },
  },
  async run(ctx) {
    const config = await loadCliConfig();
    const connector = new Connector(connectorOptionsFrom(config));
    const host = requireOption("host", ctx.values.host);

    const dropped = new Promise<void>((resolve) => {
      connector.statusStream.subscribe((status) => {
        console.log(formatStatus(status));
        if (status === "none") {
          resolve();
        }
      });
    });

    if (!(await connector.connect(host, parseInteger("port", ctx.values.port)))) {
      console.error(`Cannot connect to ${host}: ${connector.lastError?.message ?? "unknown error"}`);
      process.exitCode = 1;
      return;
    }

    const onInterrupt = () => {
      void connector.disconnect();
    };
    process.once("SIGINT", onInterrupt);

    await dropped;
    process.removeListener("SIGINT", onInterrupt);

    const reason = connector.lastError;
    if (reason) {
      console.log(`${reason.code}: ${reason.message}`);
    }
    await connector.dispose();
  },
});
