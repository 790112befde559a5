/**
 * KEY=VALUE env file helpers
 *
 * Secret files under /etc/secrets are plain shell env files that the
 * compose scripts also `source`; dotenv accepts their `export ` prefixes
 * and quoted values.
 */

import { readFile, writeFile, mkdir, chmod } from "node:fs/promises";
import { dirname } from "node:path";
import dotenv from "dotenv";

/**
 * Parses env file text into an ordered map of keys and values
 */
export function parseEnvFile(text: string): Map<string, string> {
    return new Map(Object.entries(dotenv.parse(text)));
}

/**
 * Returns true when the error is a missing-file error
 */
export function isNotFoundError(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Reads and parses an env file.
 * Returns null if the file doesn't exist.
 */
export async function readEnvFile(path: string): Promise<Map<string, string> | null> {
    try {
        const raw = await readFile(path, "utf-8");
        return parseEnvFile(raw);
    } catch (error) {
        if (isNotFoundError(error)) {
            return null;
        }
        throw error;
    }
}

export interface WriteSecretFileOptions {
    /** File mode (default 0o640) */
    mode?: number;
}

/**
 * Writes a secret file, creating its directory first
 */
export async function writeSecretFile(
    path: string,
    content: string,
    options: WriteSecretFileOptions = {}
): Promise<void> {
    const { mode = 0o640 } = options;

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, { encoding: "utf-8", mode });
    // writeFile only applies mode when it creates the file
    await chmod(path, mode);
}
