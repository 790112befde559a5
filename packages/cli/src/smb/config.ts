/**
 * SMB share configuration (/etc/secrets/.smb)
 *
 * Numbered env keys describe each file server:
 *
 *   SMB_HOST_1=nas.home.arpa
 *   SMB_HOST_1_USER=media
 *   SMB_HOST_1_PW=secret
 *   SMB_HOST_1_SHARE_1=movies
 *   SMB_HOST_1_SHARE_2=music
 *
 * Shares are read from _SHARE_1 upwards until the first missing number.
 */

import { SECRET_PATHS, SECRETS_GROUP, writeSecretFile } from "@hostkit/shared";
import { run } from "../lib/exec.js";

const HOST_PREFIX = "SMB_HOST_";

export interface SmbHost {
    /** Id taken from the SMB_HOST_<id> key */
    id: string;
    /** Server hostname or address */
    host: string;
    user: string;
    password: string;
    /** Share names in file order */
    shares: string[];
}

export interface ParsedSmbConfig {
    hosts: SmbHost[];
    /** Hosts skipped because of missing values */
    warnings: string[];
}

/**
 * Host entry as rendered back into the file
 */
export type SmbHostEntry = Omit<SmbHost, "id">;

/**
 * Returns true for SMB_HOST_<id> keys (not their _USER/_PW/_SHARE_ siblings)
 */
export function isHostKey(key: string): boolean {
    return (
        key.startsWith(HOST_PREFIX) &&
        !key.includes("_USER") &&
        !key.includes("_PW") &&
        !key.includes("_SHARE_")
    );
}

/**
 * Builds the host list from parsed env entries
 */
export function parseSmbConfig(env: Map<string, string>): ParsedSmbConfig {
    const hosts: SmbHost[] = [];
    const warnings: string[] = [];

    for (const key of env.keys()) {
        if (!isHostKey(key)) {
            continue;
        }
        const id = key.slice(HOST_PREFIX.length);
        const host = env.get(key) ?? "";
        const user = env.get(`${key}_USER`) ?? "";
        const password = env.get(`${key}_PW`) ?? "";

        if (!host || !user || !password) {
            warnings.push(`Missing required configuration for ${key}`);
            continue;
        }

        const shares: string[] = [];
        for (let n = 1; ; n++) {
            const share = env.get(`${key}_SHARE_${n}`);
            if (!share) {
                break;
            }
            shares.push(share);
        }

        hosts.push({ id, host, user, password, shares });
    }

    return { hosts, warnings };
}

/**
 * Renders hosts in the .smb file format, numbered from 1
 */
export function renderSmbConfig(hosts: SmbHostEntry[]): string {
    const blocks = hosts.map((entry, index) => {
        const key = `${HOST_PREFIX}${index + 1}`;
        const lines = [`${key}=${entry.host}`, `${key}_USER=${entry.user}`, `${key}_PW=${entry.password}`];
        entry.shares.forEach((share, shareIndex) => {
            lines.push(`${key}_SHARE_${shareIndex + 1}=${share}`);
        });
        return lines.join("\n");
    });
    return blocks.join("\n\n") + "\n";
}

/**
 * Template written when no .smb file exists
 */
export function smbConfigTemplate(): string {
    return (
        "# SMB shares mounted by `hostkit smb mount`\n" +
        "# One block per server; shares are numbered from 1 without gaps.\n\n" +
        renderSmbConfig([
            {
                host: "server1.home.arpa",
                user: "myuser",
                password: "mypassword",
                shares: ["share1", "share2"],
            },
            {
                host: "server2.home.arpa",
                user: "otheruser",
                password: "otherpassword",
                shares: ["othershare"],
            },
        ])
    );
}

/**
 * Gives a file to root:secrets, creating the group when missing
 */
export async function secureSecretFile(path: string): Promise<void> {
    const group = await run("getent", ["group", SECRETS_GROUP], { check: false });
    if (group.exitCode !== 0) {
        await run("groupadd", [SECRETS_GROUP]);
    }
    await run("chown", [`root:${SECRETS_GROUP}`, path]);
    await run("chmod", ["0640", path]);
}

/**
 * Writes the template config file, owned by root:secrets
 */
export async function writeSmbConfigTemplate(path: string = SECRET_PATHS.smb): Promise<void> {
    await writeSecretFile(path, smbConfigTemplate(), { mode: 0o640 });
    await secureSecretFile(path);
}
