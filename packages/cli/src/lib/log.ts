/**
 * Process-wide logger for the CLI
 *
 * Configured once from the global --log-file / --verbose options before
 * a command runs; modules fetch it with getLogger().
 */

import {
    configureLogging as configureLogTape,
    createLogger,
    type Logger,
    type LoggingOptions,
} from "@hostkit/shared";

const cliLogger = createLogger("cli");

/**
 * Points the CLI's logging at the console and, optionally, a log file
 */
export async function configureLogging(options: LoggingOptions): Promise<void> {
    await configureLogTape(options);
}

/**
 * Returns the CLI logger
 */
export function getLogger(): Logger {
    return cliLogger;
}
