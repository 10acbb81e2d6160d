import { readFile } from "node:fs/promises";
import { define } from "gunshi";
import { Connector, connectorOptionsFrom } from "../connector/connector.js";
import { loadCliConfig, parseInteger, requireOption } from "./options.js";

async function readStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

export const send = define({
  name: "send",
  description: "Send a file (or stdin) to a printer as raw bytes",
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
    file: {
      type: "string",
      short: "f",
      description: "File to send; stdin when omitted",
    },
    delay: {
      type: "string",
      short: "d",
      description: "Milliseconds to wait after closing before reporting done",
    },
  },
  async run(ctx) {
    const config = await loadCliConfig();
    const connector = new Connector(connectorOptionsFrom(config));
    const host = requireOption("host", ctx.values.host);
    const { file } = ctx.values;

    const payload = file ? await readFile(file) : await readStdin();

    if (!(await connector.connect(host, parseInteger("port", ctx.values.port)))) {
      console.error(`Cannot connect to ${host}: ${connector.lastError?.message ?? "unknown error"}`);
      process.exitCode = 1;
      return;
    }

    const sent = await connector.send(payload);
    await connector.disconnect(parseInteger("delay", ctx.values.delay));
    await connector.dispose();

    if (!sent) {
      console.error(`Send to ${host} failed: ${connector.lastError?.message ?? "unknown error"}`);
      process.exitCode = 1;
      return;
    }
    console.log(`Sent ${payload.length} bytes to ${host}`);
  },
});
