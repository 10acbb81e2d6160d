import { cli, type CliOptions } from "gunshi";
import { discover } from "./discover.js";
import { send } from "./send.js";
import { watch } from "./watch.js";
import { zeroconf } from "./zeroconf.js";

const subCommands: NonNullable<CliOptions["subCommands"]> = new Map();
subCommands.set("discover", discover);
subCommands.set("send", send);
subCommands.set("watch", watch);
subCommands.set("zeroconf", zeroconf);

/** `discover` runs when no subcommand is named. */
export async function runCli(argv: string[]): Promise<void> {
  await cli(argv, discover, {
    name: "lanprint",
    version: "0.1.0",
    description: "Find raw TCP printers on the local network and talk to them",
    subCommands,
  });
}
