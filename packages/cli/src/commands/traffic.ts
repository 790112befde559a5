/**
 * traffic command - Summarize reverse-proxy connection attempts
 *
 * Reads the Traefik container's log (or a saved log file), drops private
 * clients and prints who is knocking, from where, and what they probe.
 */

import { readFile } from "node:fs/promises";
import type { CommandModule } from "yargs";
import chalk from "chalk";
import { commandExists, run } from "../lib/exec.js";
import { TrafficAnalyzer } from "../traffic/analyzer.js";
import { renderReport } from "../traffic/report.js";

interface TrafficArgs {
    container: string;
    file?: string;
    json: boolean;
}

/**
 * Largest container log read, per stream
 */
export const LOG_MAX_BUFFER = 512 * 1024 * 1024;

/**
 * Reads log lines from docker in the order they were written; stdout and
 * stderr are both kept since the proxy logs to stderr
 */
export async function readContainerLogs(container: string): Promise<string[]> {
    const result = await run("docker", ["logs", container], {
        check: false,
        all: true,
        maxBuffer: LOG_MAX_BUFFER,
    });
    if (result.exitCode !== 0) {
        throw new Error(`Error retrieving logs from ${container}: ${result.stderr.trim()}`);
    }
    return result.all.split("\n").filter((line) => line.length > 0);
}

export const trafficCommand: CommandModule<object, TrafficArgs> = {
    command: "traffic",
    describe: "Analyze Traefik logs for external connection attempts",
    builder: (yargs) =>
        yargs
            .option("container", {
                type: "string",
                description: "Container to read logs from",
                default: "traefik",
            })
            .option("file", {
                type: "string",
                description: "Read a saved log file instead of docker logs",
            })
            .option("json", {
                type: "boolean",
                description: "Print the analysis as JSON",
                default: false,
            }),
    handler: async (argv) => {
        // Progress goes to stderr so --json output stays parseable
        const progress = argv.json ? console.error : console.log;

        let lines: string[];
        try {
            if (argv.file) {
                lines = (await readFile(argv.file, "utf-8")).split("\n").filter((l) => l.length > 0);
            } else {
                const docker = await run("docker", ["ps"], { check: false });
                if (docker.exitCode !== 0) {
                    console.error(chalk.red("Error: Docker is not running or not installed."));
                    process.exit(1);
                }
                progress(`Collecting logs from the ${argv.container} container...`);
                lines = await readContainerLogs(argv.container);
            }
        } catch (error) {
            console.error(chalk.red(error instanceof Error ? error.message : String(error)));
            process.exit(1);
        }

        if (!(await commandExists("geoiplookup"))) {
            progress(
                chalk.yellow(
                    "Warning: geoiplookup is not installed. Country information will not be available."
                )
            );
            progress("Install it with: sudo apt-get install geoip-bin");
        }

        const analyzer = new TrafficAnalyzer();
        if (lines.length === 0) {
            progress("No log lines found.");
        } else {
            progress(`Processing ${lines.length} log lines...`);
            const processed = await analyzer.analyzeLines(lines);
            progress(`Successfully processed ${processed} connection attempts.`);
        }

        if (argv.json) {
            console.log(JSON.stringify(analyzer.toSummary(), null, 2));
        } else {
            console.log(renderReport(analyzer).join("\n"));
        }
    },
};
