/**
 * Docker Compose stack control
 *
 * Brings the host's compose stack up with secrets from /etc/secrets
 * exported into the environment, and takes it down again.
 */

import { access, chmod, mkdir, writeFile } from "node:fs/promises";
import { constants } from "node:fs";
import { hostname as osHostname } from "node:os";
import { join } from "node:path";
import chalk from "chalk";
import { SECRET_PATHS, hostSecretsPath, readEnvFile } from "@hostkit/shared";
import { run } from "../lib/exec.js";

export interface ComposeOptions {
    /** Directory holding docker-compose.yml */
    composeDir: string;
    /** Extra arguments passed through to docker compose */
    args?: string[];
    /** Docker env file (default /etc/secrets/.docker) */
    dockerEnvFile?: string;
    /** Host secrets file (default /etc/secrets/.<hostname>) */
    hostEnvFile?: string;
}

/**
 * Creates traefik/acme.json when missing and forces mode 600
 */
export async function ensureAcmeStore(composeDir: string): Promise<string> {
    const dir = join(composeDir, "traefik");
    const path = join(dir, "acme.json");
    await mkdir(dir, { recursive: true });
    try {
        await writeFile(path, "", { flag: "wx", mode: 0o600 });
        console.log("Creating empty acme.json file...");
    } catch (error) {
        if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
            throw error;
        }
    }
    await chmod(path, 0o600);
    return path;
}

/**
 * Merges env files in order; later files win. Missing files are reported
 * and skipped.
 */
export async function loadSecretEnv(paths: string[]): Promise<Record<string, string>> {
    const env: Record<string, string> = {};
    for (const path of paths) {
        const values = await readEnvFile(path);
        if (!values) {
            console.log(chalk.yellow(`Warning: ${path} not found, skipping`));
            continue;
        }
        for (const [key, value] of values) {
            env[key] = value;
        }
    }
    return env;
}

/**
 * Returns true when the current user can read a file
 */
export async function isReadable(path: string): Promise<boolean> {
    try {
        await access(path, constants.R_OK);
        return true;
    } catch (error) {
        if (error instanceof Error && "code" in error) {
            return false;
        }
        throw error;
    }
}

/**
 * `docker compose up` with secrets exported; returns the exit code
 */
export async function composeUp(options: ComposeOptions): Promise<number> {
    const {
        composeDir,
        args = [],
        dockerEnvFile = SECRET_PATHS.docker,
        hostEnvFile = hostSecretsPath(osHostname()),
    } = options;

    await ensureAcmeStore(composeDir);
    const env = await loadSecretEnv([hostEnvFile, dockerEnvFile]);
    const acmeEmail = env.ACME_EMAIL ?? "";
    env.ACME_EMAIL = acmeEmail;
    console.log(`Using ACME_EMAIL: ${acmeEmail}`);

    const result = await run(
        "sudo",
        ["-E", "docker", "compose", "--env-file", dockerEnvFile, "up", ...args],
        { cwd: composeDir, env, inherit: true }
    );
    return result.exitCode;
}

/**
 * `docker compose down`, with the docker env file when it is readable
 */
export async function composeDown(options: ComposeOptions): Promise<number> {
    const { composeDir, args = [], dockerEnvFile = SECRET_PATHS.docker } = options;

    const composeArgs = ["-E", "docker", "compose"];
    if (await isReadable(dockerEnvFile)) {
        console.log(`Using environment variables from ${dockerEnvFile}`);
        composeArgs.push("--env-file", dockerEnvFile);
    } else {
        console.log(chalk.yellow(`Warning: Cannot read ${dockerEnvFile}`));
    }

    const result = await run("sudo", [...composeArgs, "down", ...args], {
        cwd: composeDir,
        inherit: true,
    });
    if (result.exitCode === 0) {
        console.log("All services have been stopped.");
    }
    return result.exitCode;
}
