/**
 * smb command - Discover and mount CIFS shares
 *
 * `smb discover` scans the LAN for file servers and lists their shares.
 * `smb mount` mounts every share in /etc/secrets/.smb and records it in
 * /etc/fstab.
 */

import type { CommandModule } from "yargs";
import { password as promptPassword } from "@inquirer/prompts";
import chalk from "chalk";
import { DEFAULT_LAN_CIDR, SECRET_PATHS, readEnvFile, writeSecretFile } from "@hostkit/shared";
import { discoverShares, type ShareListing, type SmbCredentials } from "../smb/discovery.js";
import {
    parseSmbConfig,
    renderSmbConfig,
    secureSecretFile,
    writeSmbConfigTemplate,
    type SmbHostEntry,
} from "../smb/config.js";
import { mountShares, type MountResult } from "../smb/mount.js";
import { detectNonRootUser, requireRoot } from "../utils/non-root-user.js";
import { getLogger } from "../lib/log.js";

interface DiscoverArgs {
    subnet: string;
    host?: string[];
    user?: string;
    write: boolean;
}

interface MountArgs {
    config: string;
    user?: string;
}

/**
 * Prints one server's shares
 */
export function describeListing(listing: ShareListing): string[] {
    if (!listing.protocol) {
        return [
            chalk.red(`${listing.host}: no SMB dialect answered`),
            ...listing.errors.map((error) => `  ${error}`),
        ];
    }
    const lines = [chalk.cyan(`${listing.host} (${listing.protocol})`)];
    if (listing.shares.length === 0) {
        lines.push("  (no shares)");
    }
    for (const share of listing.shares) {
        lines.push(share.comment ? `  ${share.name} - ${share.comment}` : `  ${share.name}`);
    }
    return lines;
}

/**
 * Converts listings into config entries; servers without shares are dropped
 */
export function listingsToEntries(
    listings: ShareListing[],
    credentials: SmbCredentials
): SmbHostEntry[] {
    return listings
        .filter((listing) => listing.shares.length > 0)
        .map((listing) => ({
            host: listing.host,
            user: credentials.user,
            password: credentials.password,
            shares: listing.shares.map((share) => share.name),
        }));
}

/**
 * One line per share plus the totals
 */
export function summarizeMounts(results: MountResult[]): { lines: string[]; failed: number } {
    const lines: string[] = [];
    let failed = 0;
    for (const result of results) {
        const source = `//${result.host}/${result.share}`;
        if (result.mounted) {
            lines.push(chalk.green(`  OK      ${source} -> ${result.mountPoint} (${result.version})`));
        } else {
            failed++;
            lines.push(chalk.red(`  FAILED  ${source} -> ${result.mountPoint}`));
        }
    }
    lines.push(`${results.length - failed} of ${results.length} share(s) mounted`);
    return { lines, failed };
}

const discoverCommand: CommandModule<object, DiscoverArgs> = {
    command: "discover",
    describe: "Scan the network for SMB servers and list their shares",
    builder: (yargs) =>
        yargs
            .option("subnet", {
                type: "string",
                description: "CIDR to scan for port 445",
                default: DEFAULT_LAN_CIDR,
            })
            .option("host", {
                type: "string",
                array: true,
                description: "Query these servers instead of scanning",
            })
            .option("user", {
                type: "string",
                description: "Username for listing shares (anonymous when omitted)",
            })
            .option("write", {
                type: "boolean",
                description: `Write the discovered shares to ${SECRET_PATHS.smb}`,
                default: false,
            })
            .example("$0 smb discover", "Scan the default LAN")
            .example("$0 smb discover --host nas.local --user media", "Query one server"),
    handler: async (argv) => {
        let credentials: SmbCredentials | undefined;
        if (argv.user) {
            const secret = await promptPassword({ message: `Password for ${argv.user}:` });
            credentials = { user: argv.user, password: secret };
        }
        if (argv.write && !credentials) {
            console.error(chalk.red("--write needs --user so the shares can be mounted later"));
            process.exit(1);
        }

        const hosts = argv.host ?? [];
        console.log(
            chalk.blue(hosts.length > 0 ? `Querying ${hosts.join(", ")}...` : `Scanning ${argv.subnet}...`)
        );

        try {
            const listings = await discoverShares({ subnet: argv.subnet, hosts, credentials });
            if (listings.length === 0) {
                console.log(chalk.yellow("No SMB servers found."));
                return;
            }
            for (const listing of listings) {
                console.log(describeListing(listing).join("\n"));
            }

            if (argv.write && credentials) {
                const entries = listingsToEntries(listings, credentials);
                await writeSecretFile(SECRET_PATHS.smb, renderSmbConfig(entries), { mode: 0o640 });
                await secureSecretFile(SECRET_PATHS.smb);
                console.log(chalk.green(`\nWrote ${entries.length} server(s) to ${SECRET_PATHS.smb}`));
            }
        } catch (error) {
            console.error(chalk.red(`Discovery failed: ${error instanceof Error ? error.message : error}`));
            process.exit(1);
        }
    },
};

/**
 * Mounts every share in the config file; returns the exit code
 */
async function mountFromConfig(config: string, owner?: string): Promise<number> {
    const logger = getLogger();

    const env = await readEnvFile(config);
    if (!env) {
        logger.info(`SMB environment file not found at ${config}, creating template...`);
        await writeSmbConfigTemplate(config);
        logger.info(`Template created. Please edit ${config} with your share information and re-run.`);
        return 0;
    }

    const { hosts, warnings } = parseSmbConfig(env);
    for (const warning of warnings) {
        logger.warn(chalk.yellow(warning));
    }
    if (hosts.length === 0) {
        logger.warn(chalk.yellow(`No complete SMB hosts in ${config}`));
        return warnings.length > 0 ? 1 : 0;
    }

    const user = owner ?? (await detectNonRootUser());
    logger.info(`Mounting shares for local user ${user}`);

    const results = await mountShares(hosts, { user });
    const { lines, failed } = summarizeMounts(results);
    logger.info("----------------------------------------");
    for (const line of lines) {
        logger.info(line);
    }

    if (failed > 0 || warnings.length > 0) {
        logger.error(chalk.red("ERROR: There were errors during the run."));
        return 1;
    }
    logger.info(chalk.green("SUCCESS: All shares are mounted."));
    return 0;
}

export const mountCommand: CommandModule<object, MountArgs> = {
    command: "mount",
    describe: "Mount the shares listed in the SMB secrets file",
    builder: (yargs) =>
        yargs
            .option("config", {
                type: "string",
                description: "SMB secrets file",
                default: SECRET_PATHS.smb,
            })
            .option("user", {
                type: "string",
                description: "Local owner of the mounted files (detected when omitted)",
            }),
    handler: async (argv) => {
        await requireRoot();

        try {
            process.exitCode = await mountFromConfig(argv.config, argv.user);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            getLogger().error(chalk.red(`Mount failed: ${message}`));
            process.exitCode = 1;
        }
    },
};

export const smbCommand: CommandModule = {
    command: "smb <command>",
    describe: "Discover and mount SMB/CIFS shares",
    builder: (yargs) => yargs.command(discoverCommand).command(mountCommand).demandCommand(1),
    handler: () => {},
};
