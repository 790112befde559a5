#!/usr/bin/env node

/**
 * hostkit CLI
 *
 * Day-to-day tooling for a provisioned host: configure the Pulumi stack,
 * mount SMB shares, read proxy traffic, scan for leaked secrets and drive
 * the compose stack. Run `hostkit --help` for usage information.
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { configureLogging } from "./lib/log.js";
import { setupCommand } from "./commands/setup.js";
import { smbCommand } from "./commands/smb.js";
import { trafficCommand } from "./commands/traffic.js";
import { scanSecretsCommand } from "./commands/scan-secrets.js";
import { composeCommand } from "./commands/compose.js";

await yargs(hideBin(process.argv))
    .scriptName("hostkit")
    .usage("$0 <command> [options]")
    .option("log-file", {
        type: "string",
        description: "File that receives the debug log",
        default: "hostkit.log",
        global: true,
    })
    .option("verbose", {
        type: "boolean",
        description: "Print debug messages to the console",
        default: false,
        global: true,
    })
    .middleware(async (argv) => {
        await configureLogging({
            file: argv["log-file"],
            consoleLevel: argv.verbose ? "debug" : "info",
        });
    })
    .command(setupCommand)
    .command(smbCommand)
    .command(trafficCommand)
    .command(scanSecretsCommand)
    .command(composeCommand)
    .demandCommand(1, "Please specify a command. Run hostkit --help for available commands.")
    .strict()
    .help()
    .alias("h", "help")
    .version("1.0.0")
    .alias("v", "version")
    .parseAsync();
