/**
 * Resolves the human (non-root) account the host is administered by.
 *
 * Priority when running as root:
 *   1. SUDO_USER (set by sudo)
 *   2. LOGNAME
 *   3. Interactive prompt
 *   4. First regular account in /etc/passwd with a home under /home
 *   5. "standard"
 *
 * A non-root caller is simply the current user.
 */

import { readFile } from "node:fs/promises";
import { input } from "@inquirer/prompts";
import { execa } from "execa";
import chalk from "chalk";
import { getCurrentUsername } from "@hostkit/shared";
import { commandExists } from "../lib/exec.js";

/**
 * Last-resort admin username
 */
export const FALLBACK_USER = "standard";

export interface NonRootUserSources {
    /** Whether the process runs as root */
    isRoot: boolean;
    /** Username of the running process */
    currentUser: string;
    /** Environment to read SUDO_USER / LOGNAME from */
    env: NodeJS.ProcessEnv;
    /** Asks the operator for a username */
    ask: () => Promise<string>;
    /** Returns /etc/passwd contents */
    readPasswd: () => Promise<string>;
}

function defaultSources(): NonRootUserSources {
    return {
        isRoot: process.getuid?.() === 0,
        currentUser: getCurrentUsername(),
        env: process.env,
        ask: () => input({ message: "Enter the non-root username to configure:" }),
        readPasswd: () => readFile("/etc/passwd", "utf-8"),
    };
}

const SYSTEM_ACCOUNTS: ReadonlySet<string> = new Set(["root", "nobody", "systemd"]);

function usable(name: string | undefined): name is string {
    return name !== undefined && name.trim().length > 0 && name.trim() !== "root";
}

/**
 * Returns the first regular account in /etc/passwd contents
 */
export function firstRegularUser(passwd: string): string | undefined {
    for (const line of passwd.split("\n")) {
        const fields = line.split(":");
        const name = fields[0];
        const home = fields[5];
        if (!name || home === undefined) {
            continue;
        }
        if (SYSTEM_ACCOUNTS.has(name)) {
            continue;
        }
        if (home.includes("/home")) {
            return name;
        }
    }
    return undefined;
}

/**
 * Detects the non-root admin user
 */
export async function detectNonRootUser(sources: Partial<NonRootUserSources> = {}): Promise<string> {
    const { isRoot, currentUser, env, ask, readPasswd } = { ...defaultSources(), ...sources };

    if (!isRoot) {
        return currentUser;
    }
    if (usable(env.SUDO_USER)) {
        return env.SUDO_USER.trim();
    }
    if (usable(env.LOGNAME)) {
        return env.LOGNAME.trim();
    }

    const answer = await ask();
    if (usable(answer)) {
        return answer.trim();
    }

    return firstRegularUser(await readPasswd()) ?? FALLBACK_USER;
}

/**
 * Re-runs the current command under sudo when not root.
 * Exits the process with the child's exit code, or 1 without sudo.
 */
export async function requireRoot(): Promise<void> {
    if (process.getuid?.() === 0) {
        return;
    }

    if (!(await commandExists("sudo"))) {
        console.error(chalk.red("This command must be run as root."));
        console.error("Switch to root with: su -");
        process.exit(1);
    }

    console.log(chalk.yellow("Elevating privileges with sudo..."));
    const result = await execa(
        "sudo",
        ["-E", process.execPath, ...process.execArgv, ...process.argv.slice(1)],
        { stdio: "inherit", reject: false }
    );
    process.exit(result.exitCode ?? 1);
}
