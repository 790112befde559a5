/**
 * External command runner
 *
 * Every probe and system change the CLI makes goes through run(): it never
 * throws on a non-zero exit, logs the command, timing and (truncated)
 * output at debug level, and logs failures at error level unless the
 * caller expects them.
 */

import { execa } from "execa";
import { getLogger } from "./log.js";

/**
 * Captured output longer than this is truncated in the log
 */
export const OUTPUT_LOG_LIMIT = 500;

export interface RunOptions {
    /** Log a non-zero exit as an error (default true) */
    check?: boolean;
    /** Text written to stdin */
    input?: string;
    /** Extra environment variables */
    env?: Record<string, string>;
    /** Working directory */
    cwd?: string;
    /** Attach the child to this terminal instead of capturing output */
    inherit?: boolean;
    /** Also capture stdout and stderr interleaved, as `all` */
    all?: boolean;
    /** Largest output kept per stream, in bytes (execa's default when omitted) */
    maxBuffer?: number;
}

export interface RunResult {
    /** Command line as logged */
    command: string;
    /** Exit code (127 when the program could not be started) */
    exitCode: number;
    stdout: string;
    stderr: string;
    /** stdout and stderr in arrival order; empty unless requested */
    all: string;
    /** Wall-clock duration */
    durationMs: number;
}

/**
 * Truncates captured output for logging
 */
export function truncateOutput(text: string, limit = OUTPUT_LOG_LIMIT): string {
    return text.length > limit ? `${text.slice(0, limit)}... [truncated]` : text;
}

/**
 * Runs a program and captures its output
 */
export async function run(
    file: string,
    args: string[] = [],
    options: RunOptions = {}
): Promise<RunResult> {
    const { check = true, input, env, cwd, inherit = false, all = false, maxBuffer } = options;
    const logger = getLogger();
    const command = [file, ...args].join(" ");
    const started = Date.now();

    logger.debug(`Running command: ${command}`);
    const result = inherit
        ? await execa(file, args, { reject: false, env, cwd, stdio: "inherit" })
        : await execa(file, args, {
              reject: false,
              input,
              env,
              cwd,
              all,
              ...(maxBuffer === undefined ? {} : { maxBuffer }),
          });
    const durationMs = Date.now() - started;

    const exitCode = result.exitCode ?? 127;
    const stdout = typeof result.stdout === "string" ? result.stdout : "";
    const stderr = typeof result.stderr === "string" ? result.stderr : "";
    const combined = typeof result.all === "string" ? result.all : "";

    const seconds = (durationMs / 1000).toFixed(2);
    logger.debug(`Command completed in ${seconds}s with exit code ${exitCode}`);
    if (stdout) {
        logger.debug(`STDOUT: ${truncateOutput(stdout)}`);
    }
    if (stderr) {
        logger.debug(`STDERR: ${truncateOutput(stderr)}`);
    }
    if (check && exitCode !== 0) {
        logger.error(`Command failed: ${command}`);
        logger.error(`Error: ${truncateOutput(stderr || stdout)}`);
    }

    return { command, exitCode, stdout, stderr, all: combined, durationMs };
}

/**
 * Returns true when a program is on PATH
 */
export async function commandExists(name: string): Promise<boolean> {
    const result = await run("which", [name], { check: false });
    return result.exitCode === 0;
}
