/**
 * setup command - Interactive setup wizard
 *
 * Prompts for the host settings and stores them in the current Pulumi
 * stack's config under the hostkit namespace.
 */

import type { CommandModule } from "yargs";
import { checkbox, confirm, input, password } from "@inquirer/prompts";
import { execa } from "execa";
import chalk from "chalk";
import {
    CONFIG_NAMESPACE,
    DEFAULT_LAN_CIDR,
    OPTIONAL_PACKAGES,
    isValidCidr,
    isValidPublicKey,
    isValidSubdomain,
    isValidTime,
    isValidUsername,
} from "@hostkit/shared";
import { detectNonRootUser } from "../utils/non-root-user.js";

/**
 * One `pulumi config set` invocation
 */
export interface ConfigEntry {
    key: string;
    value: string;
    secret?: boolean;
}

export interface SetupAnswers {
    adminUser: string;
    sshKeys: string[];
    lanCidr: string;
    packages: string[];
    autoReboot: boolean;
    rebootTime: string;
    domain: string;
    zoneId: string;
    apiToken: string;
    subdomains: string[];
}

/**
 * Splits comma or newline separated input into trimmed items
 */
export function splitList(value: string): string[] {
    return value
        .split(/[,\n]/)
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/**
 * Maps wizard answers to config entries, in the order they are written
 */
export function buildConfigEntries(answers: SetupAnswers): ConfigEntry[] {
    const key = (name: string) => `${CONFIG_NAMESPACE}:${name}`;
    const entries: ConfigEntry[] = [
        { key: key("admin-user"), value: answers.adminUser },
        { key: key("ssh-authorized-keys"), value: JSON.stringify(answers.sshKeys) },
        { key: key("ssh-lan-cidr"), value: answers.lanCidr },
        { key: key("packages"), value: JSON.stringify(answers.packages) },
        { key: key("auto-updates-reboot"), value: String(answers.autoReboot) },
    ];
    if (answers.autoReboot) {
        entries.push({ key: key("auto-updates-reboot-time"), value: answers.rebootTime });
    }
    if (answers.domain) {
        entries.push(
            { key: key("domain"), value: answers.domain },
            { key: key("cloudflare-zone-id"), value: answers.zoneId },
            { key: key("dns-subdomains"), value: JSON.stringify(answers.subdomains) }
        );
        if (answers.apiToken) {
            entries.push({ key: "cloudflare:apiToken", value: answers.apiToken, secret: true });
        }
    }
    return entries;
}

async function runPulumiConfig(entry: ConfigEntry): Promise<void> {
    const args = ["config", "set", entry.key, entry.value];
    if (entry.secret) {
        args.push("--secret");
    }
    await execa("pulumi", args, { stdio: "inherit" });
}

async function checkPulumiStack(): Promise<boolean> {
    const result = await execa("pulumi", ["stack", "--show-name"], { reject: false });
    return result.exitCode === 0;
}

export const setupCommand: CommandModule = {
    command: "setup",
    describe: "Interactive setup wizard (configure Pulumi)",
    builder: {},
    handler: async () => {
        console.log("\nhostkit Setup\n");
        console.log("This wizard stores the host settings in the Pulumi stack config.");
        console.log("Run it from packages/host, where Pulumi.yaml lives.\n");

        // Check if Pulumi stack exists
        const hasStack = await checkPulumiStack();
        if (!hasStack) {
            console.log("No Pulumi stack found. Creating one...\n");

            const stackName = await input({
                message: "Stack name:",
                default: "dev",
            });

            await execa("pulumi", ["stack", "init", stackName], { stdio: "inherit" });
            console.log();
        }

        // Admin user
        console.log("Admin User\n");

        const adminUser = await input({
            message: "Admin username (must already exist):",
            default: await detectNonRootUser(),
            validate: (v) =>
                isValidUsername(v) ||
                "Username must be a non-root account of lowercase letters, digits, '-' or '_'",
        });

        // SSH
        console.log("\nSSH Configuration\n");

        const sshKeysInput = await input({
            message: "SSH public keys (comma-separated, or paste one key):",
            validate: (v) => {
                const keys = splitList(v);
                if (keys.length === 0) return "At least one SSH key is required";
                const bad = keys.find((k) => !isValidPublicKey(k));
                return bad === undefined || `Not an SSH public key: ${bad.slice(0, 40)}`;
            },
        });
        const sshKeys = splitList(sshKeysInput);

        const lanCidr = await input({
            message: "LAN subnet allowed to log in as root (CIDR):",
            default: DEFAULT_LAN_CIDR,
            validate: (v) => isValidCidr(v) || "Expected an IPv4 CIDR such as 192.168.1.0/24",
        });

        // Packages
        console.log("\nPackages\n");

        const packages = await checkbox({
            message: "Optional packages to install:",
            choices: OPTIONAL_PACKAGES.map((name) => ({ name, value: name })),
            pageSize: OPTIONAL_PACKAGES.length,
        });

        // Automatic updates
        console.log("\nAutomatic Updates\n");

        const autoReboot = await confirm({
            message: "Reboot automatically when an update requires it?",
            default: false,
        });
        let rebootTime = "02:00";
        if (autoReboot) {
            rebootTime = await input({
                message: "Reboot time (HH:MM):",
                default: rebootTime,
                validate: (v) => isValidTime(v) || "Expected HH:MM",
            });
        }

        // DNS
        console.log("\nDNS (Cloudflare)\n");

        const domain = (
            await input({
                message: "Domain the host serves (leave empty to skip DNS):",
                default: "",
            })
        ).trim();

        let zoneId = "";
        let apiToken = "";
        let subdomains: string[] = [];
        if (domain) {
            zoneId = await input({
                message: "Cloudflare zone ID:",
                validate: (v) => v.trim().length > 0 || "Zone ID is required",
            });
            apiToken = await password({
                message: "Cloudflare API token (leave empty to keep the current one):",
            });
            const subdomainsInput = await input({
                message: "Subdomains to point at the domain (comma-separated):",
                default: "",
                validate: (v) => {
                    const bad = splitList(v).find((s) => !isValidSubdomain(s.toLowerCase()));
                    return bad === undefined || `Invalid subdomain: ${bad}`;
                },
            });
            subdomains = splitList(subdomainsInput).map((s) => s.toLowerCase());
        }

        const answers: SetupAnswers = {
            adminUser,
            sshKeys,
            lanCidr,
            packages,
            autoReboot,
            rebootTime,
            domain,
            zoneId: zoneId.trim(),
            apiToken,
            subdomains,
        };

        // Confirm and save
        console.log("\nConfiguration Summary\n");
        console.log(`  Admin User:         ${adminUser}`);
        console.log(`  SSH Keys:           ${sshKeys.length} key(s)`);
        console.log(`  LAN Subnet:         ${lanCidr}`);
        console.log(`  Packages:           ${packages.length > 0 ? packages.join(", ") : "(none)"}`);
        console.log(`  Auto Reboot:        ${autoReboot ? `yes, at ${rebootTime}` : "no"}`);
        if (domain) {
            console.log(`  Domain:             ${domain}`);
            console.log(`  Zone ID:            ${answers.zoneId}`);
            console.log(`  API Token:          ${apiToken ? `${"*".repeat(10)}...` : "(unchanged)"}`);
            const names = subdomains.length > 0 ? subdomains.join(", ") : "(none)";
            console.log(`  Subdomains:         ${names}`);
        } else {
            console.log("  DNS:                (skipped)");
        }
        console.log();

        const proceed = await confirm({
            message: "Save this configuration?",
            default: true,
        });

        if (!proceed) {
            console.log("\nSetup cancelled.\n");
            process.exit(0);
        }

        // Save configuration
        console.log("\nSaving configuration...\n");

        try {
            for (const entry of buildConfigEntries(answers)) {
                await runPulumiConfig(entry);
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(chalk.red(`\nFailed to save configuration: ${message}`));
            process.exit(1);
        }

        console.log(chalk.green("\nConfiguration saved successfully!\n"));
        console.log("Next steps:");
        console.log("  1. Review: pulumi config");
        console.log("  2. Deploy: pulumi up");
        console.log();
    },
};
