/**
 * scan-secrets command - Look for secret values in a source tree
 */

import type { CommandModule } from "yargs";
import chalk from "chalk";
import { SECRET_PATHS } from "@hostkit/shared";
import { renderScanReport, scanDirectory } from "../scan/index.js";

interface ScanArgs {
    directory: string;
    patterns: string;
}

export const scanSecretsCommand: CommandModule<object, ScanArgs> = {
    command: "scan-secrets [directory]",
    describe: "Search a directory for strings listed in the secrets ignore file",
    builder: (yargs) =>
        yargs
            .positional("directory", {
                type: "string",
                description: "Directory to scan",
                default: ".",
            })
            .option("patterns", {
                type: "string",
                description: "Pattern file, one pattern per line",
                default: SECRET_PATHS.ignorePatterns,
            }),
    handler: async (argv) => {
        try {
            const result = await scanDirectory(argv.directory, argv.patterns);
            console.log(renderScanReport(result).join("\n"));
            if (result.matches.length > 0) {
                process.exitCode = 1;
            }
        } catch (error) {
            console.error(chalk.red(`Error: ${error instanceof Error ? error.message : error}`));
            process.exit(1);
        }
    },
};
