/**
 * Mounts the shares from /etc/secrets/.smb
 *
 * For every share: prepare /mnt/<share>, write the server's credentials
 * file, upsert the fstab line, then mount it now, falling back from SMB 3.0
 * to 2.0 to 1.0.
 */

import { readFile, writeFile } from "node:fs/promises";
import chalk from "chalk";
import { isNotFoundError, writeSecretFile } from "@hostkit/shared";
import { run } from "../lib/exec.js";
import { getLogger } from "../lib/log.js";
import type { SmbHost } from "./config.js";
import { secureSecretFile } from "./config.js";
import {
    buildFstabEntry,
    credentialsPathFor,
    fstabKey,
    mountPointFor,
    upsertFstabEntry,
    type FstabChange,
} from "./fstab.js";

/**
 * CIFS protocol versions tried in order
 */
export const MOUNT_VERSIONS = ["3.0", "2.0", "1.0"] as const;

export interface MountSharesOptions {
    /** Local owner of the mounted files */
    user: string;
    /** fstab to update (default /etc/fstab) */
    fstabPath?: string;
    /** Mount table to check (default /proc/mounts) */
    mountsPath?: string;
    /** Directory for credentials files (default /etc) */
    credentialsDir?: string;
}

export interface MountResult {
    host: string;
    share: string;
    mountPoint: string;
    fstab: FstabChange;
    mounted: boolean;
    /** Protocol version used, "existing" when it was already mounted */
    version: string | null;
}

/**
 * Returns the mount options for one attempt
 */
export function buildMountOptions(credentialsFile: string, version: string, user: string): string {
    return [
        `credentials=${credentialsFile}`,
        `vers=${version}`,
        "iocharset=utf8",
        "file_mode=0777",
        "dir_mode=0777",
        `uid=${user}`,
        `gid=${user}`,
    ].join(",");
}

/**
 * Decodes the octal escapes (`\040` for a space) the kernel writes in the mount table
 */
export function decodeMountField(field: string): string {
    return field.replace(/\\([0-7]{3})/g, (_, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

/**
 * Returns true when the mount table lists the mount point
 */
export function isMountedIn(mounts: string, mountPoint: string): boolean {
    return mounts.split("\n").some((line) => {
        const field = line.split(" ")[1];
        return field !== undefined && decodeMountField(field) === mountPoint;
    });
}

/**
 * Renders a credentials file
 */
export function renderCredentials(user: string, password: string): string {
    return `username=${user}\npassword=${password}\n`;
}

/**
 * Creates the mount point or fixes its owner and mode
 */
export async function ensureMountPoint(mountPoint: string, user: string): Promise<void> {
    const logger = getLogger();
    const owner = `${user}:${user}`;

    const exists = await run("test", ["-d", mountPoint], { check: false });
    if (exists.exitCode !== 0) {
        await run("mkdir", ["-p", mountPoint]);
        await run("chown", [owner, mountPoint]);
        await run("chmod", ["755", mountPoint]);
        logger.info(`  Created mount point ${mountPoint}`);
        return;
    }

    const currentOwner = await run("stat", ["-c", "%U:%G", mountPoint], { check: false });
    if (currentOwner.stdout.trim() !== owner) {
        await run("chown", [owner, mountPoint]);
        logger.info(`  Fixed owner of ${mountPoint} (${currentOwner.stdout.trim()} -> ${owner})`);
    }
    const currentMode = await run("stat", ["-c", "%a", mountPoint], { check: false });
    if (currentMode.stdout.trim() !== "755") {
        await run("chmod", ["755", mountPoint]);
        logger.info(`  Fixed mode of ${mountPoint} (${currentMode.stdout.trim()} -> 755)`);
    }
}

async function readOptional(path: string): Promise<string> {
    try {
        return await readFile(path, "utf-8");
    } catch (error) {
        if (isNotFoundError(error)) {
            return "";
        }
        throw error;
    }
}

/**
 * Tries each protocol version until the share mounts.
 * Returns the version that worked, or null.
 */
export async function mountWithFallback(
    source: string,
    mountPoint: string,
    credentialsFile: string,
    user: string
): Promise<string | null> {
    const logger = getLogger();
    for (const version of MOUNT_VERSIONS) {
        const result = await run(
            "mount",
            ["-t", "cifs", source, mountPoint, "-o", buildMountOptions(credentialsFile, version, user)],
            { check: false }
        );
        if (result.exitCode === 0) {
            return version;
        }
        logger.warn(`  Mounting ${source} with SMB ${version} failed: ${result.stderr.trim()}`);
    }
    return null;
}

/**
 * Mounts every share of every host
 */
export async function mountShares(
    hosts: SmbHost[],
    options: MountSharesOptions
): Promise<MountResult[]> {
    const {
        user,
        fstabPath = "/etc/fstab",
        mountsPath = "/proc/mounts",
        credentialsDir = "/etc",
    } = options;
    const logger = getLogger();
    const results: MountResult[] = [];
    const credentialFiles: string[] = [];

    let fstab = await readOptional(fstabPath);

    for (const host of hosts) {
        logger.info(chalk.blue(`Configuring shares on ${host.host}`));

        const credentialsFile = credentialsPathFor(host.host, credentialsDir);
        await writeSecretFile(credentialsFile, renderCredentials(host.user, host.password), {
            mode: 0o640,
        });
        await secureSecretFile(credentialsFile);
        credentialFiles.push(credentialsFile);

        for (const share of host.shares) {
            const mountPoint = mountPointFor(share);
            const source = `//${host.host}/${share}`;
            logger.info(`  ${source} -> ${mountPoint}`);

            await ensureMountPoint(mountPoint, user);

            const entry = buildFstabEntry({ host: host.host, share, mountPoint, credentialsFile, user });
            const upsert = upsertFstabEntry(fstab, entry, fstabKey(host.host, share, mountPoint));
            if (upsert.change !== "unchanged") {
                fstab = upsert.content;
                await writeFile(fstabPath, fstab, "utf-8");
            }
            logger.info(`  fstab entry ${upsert.change}`);

            if (isMountedIn(await readOptional(mountsPath), mountPoint)) {
                logger.info(chalk.green(`  ${mountPoint} is already mounted`));
                results.push({
                    host: host.host,
                    share,
                    mountPoint,
                    fstab: upsert.change,
                    mounted: true,
                    version: "existing",
                });
                continue;
            }

            const version = await mountWithFallback(source, mountPoint, credentialsFile, user);
            if (version) {
                logger.info(chalk.green(`  Mounted ${mountPoint} (SMB ${version})`));
            } else {
                logger.error(
                    chalk.red(`  Failed to mount ${source}; check the credentials and the server`)
                );
            }
            results.push({
                host: host.host,
                share,
                mountPoint,
                fstab: upsert.change,
                mounted: version !== null,
                version,
            });
        }

        host.password = "";
    }

    for (const file of credentialFiles) {
        await secureSecretFile(file);
    }

    return results;
}
