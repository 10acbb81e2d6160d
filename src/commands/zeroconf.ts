import { readFile, access, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { define } from "gunshi";
import { getConfigPath } from "../config.js";
import { PrinterError, errorMessage } from "../errors.js";

export async function enableMdns(configPath: string): Promise<Record<string, unknown>> {
  let existingConfig: Record<string, unknown> = {};

  let exists = true;
  try {
    await access(configPath);
  } catch {
    exists = false;
  }

  if (exists) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(configPath, "utf-8"));
    } catch (error) {
      throw new PrinterError("InvalidConfig", `Cannot read ${configPath}: ${errorMessage(error)}`, { cause: error });
    }
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new PrinterError("InvalidConfig", `${configPath} must contain a JSON object`);
    }
    existingConfig = { ...parsed };
  }

  existingConfig.mdns = true;

  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(existingConfig, null, 2));
  return existingConfig;
}

export const zeroconf = define({
  name: "zeroconf",
  description: "Turn on mDNS discovery by default in the lanprint config",
  async run() {
    const configPath = getConfigPath();
    await enableMdns(configPath);
    console.log(`Enabled mdns in ${configPath}`);
  },
});
