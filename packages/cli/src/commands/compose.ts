/**
 * compose command - Bring the host's Docker Compose stack up or down
 */

import type { CommandModule } from "yargs";
import chalk from "chalk";
import { SECRET_PATHS } from "@hostkit/shared";
import { composeDown, composeUp } from "../compose/index.js";

interface ComposeArgs {
    dir: string;
    "env-file": string;
    args?: string[];
}

function composeSubcommand(
    action: "up" | "down",
    describe: string,
    runAction: typeof composeUp
): CommandModule<object, ComposeArgs> {
    return {
        command: `${action} [args..]`,
        describe,
        builder: (yargs) =>
            yargs
                .positional("args", {
                    type: "string",
                    array: true,
                    description: `Extra arguments for docker compose ${action}`,
                })
                .option("dir", {
                    type: "string",
                    description: "Directory containing docker-compose.yml",
                    default: process.cwd(),
                })
                .option("env-file", {
                    type: "string",
                    description: "Docker env file",
                    default: SECRET_PATHS.docker,
                }),
        handler: async (argv) => {
            try {
                const exitCode = await runAction({
                    composeDir: argv.dir,
                    args: argv.args ?? [],
                    dockerEnvFile: argv.envFile,
                });
                process.exitCode = exitCode;
            } catch (error) {
                console.error(chalk.red(`Error: ${error instanceof Error ? error.message : error}`));
                process.exit(1);
            }
        },
    };
}

export const composeCommand: CommandModule = {
    command: "compose <command>",
    describe: "Run docker compose with the host's secrets",
    builder: (yargs) =>
        yargs
            .command(composeSubcommand("up", "Start the stack (extra flags after --, e.g. -- -d)", composeUp))
            .command(composeSubcommand("down", "Stop the stack", composeDown))
            .demandCommand(1),
    handler: () => {},
};
