import { networkInterfaces } from "node:os";

export type LocalAddressProvider = () => Promise<string | undefined>;

/**
 * First external IPv4 address of this machine, or of `interfaceName` when
 * given.
 */
export async function getLocalIPv4(interfaceName?: string): Promise<string | undefined> {
  const nets = networkInterfaces();
  const names = interfaceName ? [interfaceName] : Object.keys(nets);

  for (const name of names) {
    for (const net of nets[name] ?? []) {
      if (net.family === "IPv4" && !net.internal) {
        return net.address;
      }
    }
  }

  return undefined;
}
