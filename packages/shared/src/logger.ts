/**
 * Console + file logging on LogTape
 *
 * The console gets bare messages from `info` up; the log file gets every
 * message including `debug`, timestamped and with colour codes removed.
 */

import {
    configure,
    getLogger as getLogTapeLogger,
    reset,
    withFilter,
    type LogLevel,
    type LogRecord,
    type Sink,
} from "@logtape/logtape";
import { getFileSink } from "@logtape/file";
import { stripVTControlCharacters } from "node:util";

export type { LogLevel };

/** Root category of every hostkit logger */
export const LOG_CATEGORY = "hostkit";

const STDERR_LEVELS: ReadonlySet<LogLevel> = new Set<LogLevel>(["warning", "error", "fatal"]);

export interface LoggingOptions {
    /** Log file path; no file logging when omitted */
    file?: string;
    /** Minimum level printed to the console (default info) */
    consoleLevel?: LogLevel;
}

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

function pad(value: number): string {
    return String(value).padStart(2, "0");
}

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
}

/**
 * Joins a record's message parts into plain text
 */
export function renderMessage(record: LogRecord): string {
    return record.message.map((part) => (typeof part === "string" ? part : String(part))).join("");
}

/**
 * Text formatter for the log file: `YYYY-MM-DD HH:MM:SS - LEVEL - message`
 */
export function formatLogRecord(record: LogRecord): string {
    const timestamp = formatTimestamp(new Date(record.timestamp));
    const message = stripVTControlCharacters(renderMessage(record));
    return `${timestamp} - ${record.level.toUpperCase()} - ${message}\n`;
}

/**
 * Console sink printing the bare message; warnings and errors go to stderr
 */
export function getPlainConsoleSink(): Sink {
    return (record: LogRecord) => {
        const message = renderMessage(record);
        if (STDERR_LEVELS.has(record.level)) {
            console.error(message);
        } else {
            console.log(message);
        }
    };
}

/**
 * Configures LogTape for the hostkit category.
 * Safe to call again; the previous configuration (and its file) is released.
 */
export async function configureLogging(options: LoggingOptions = {}): Promise<void> {
    const { file, consoleLevel = "info" } = options;

    const sinks: Record<string, Sink> = {
        console: withFilter(getPlainConsoleSink(), consoleLevel),
    };
    if (file) {
        sinks.file = getFileSink(file, { formatter: formatLogRecord });
    }
    const sinkNames = Object.keys(sinks);

    await configure({
        reset: true,
        sinks,
        loggers: [
            { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["console"] },
            { category: [LOG_CATEGORY], lowestLevel: "debug", sinks: sinkNames },
        ],
    });
}

/**
 * Flushes and closes every sink, leaving logging unconfigured
 */
export async function resetLogging(): Promise<void> {
    await reset();
}

/**
 * Returns a logger under the hostkit category
 */
export function createLogger(subcategory?: string): Logger {
    const logger = getLogTapeLogger(subcategory ? [LOG_CATEGORY, subcategory] : [LOG_CATEGORY]);

    // Messages go in as a property so braces in command output are never
    // read as placeholders
    return {
        debug: (message) => logger.debug("{message}", { message }),
        info: (message) => logger.info("{message}", { message }),
        warn: (message) => logger.warn("{message}", { message }),
        error: (message) => logger.error("{message}", { message }),
    };
}
