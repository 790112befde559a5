/**
 * Configuration loader for the host program
 * Loads configuration from Pulumi config with validation
 */

import * as pulumi from "@pulumi/pulumi";
import {
    CONFIG_NAMESPACE,
    DEFAULT_LAN_CIDR,
    isOptionalPackage,
    type AutoUpdatesConfig,
    type DnsConfig,
    type HostConfig,
    type OptionalPackage,
    type SSHConfig,
    isStringArray,
    isValidCidr,
    isValidPublicKey,
    isValidSubdomain,
    isValidTime,
    isValidUsername,
} from "@hostkit/shared";

/**
 * Default values for optional keys
 */
export const DEFAULT_CONFIG = {
    sshPort: 22,
    sshPermitRootLogin: true,
    autoReboot: false,
    rebootTime: "02:00",
    smbAutomount: true,
    dnsVerify: true,
} as const;

function configKey(key: string): string {
    return `${CONFIG_NAMESPACE}:${key}`;
}

function readStringList(config: pulumi.Config, key: string, required: boolean): string[] {
    const value: unknown = required ? config.requireObject(key) : config.getObject(key);
    if (value === undefined) {
        return [];
    }
    if (!isStringArray(value)) {
        throw new Error(`${configKey(key)} must be a JSON array of strings`);
    }
    return value.map((item) => item.trim()).filter((item) => item.length > 0);
}

function loadSSHConfig(config: pulumi.Config): SSHConfig {
    const authorizedKeys = [...new Set(readStringList(config, "ssh-authorized-keys", true))];
    if (authorizedKeys.length === 0) {
        throw new Error(
            `At least one SSH public key is required. Set ${configKey("ssh-authorized-keys")} ` +
                `to a JSON array, e.g. pulumi config set --path '${configKey("ssh-authorized-keys")}[0]' "ssh-ed25519 ..."`
        );
    }
    const invalidKey = authorizedKeys.find((key) => !isValidPublicKey(key));
    if (invalidKey !== undefined) {
        throw new Error(`Not an SSH public key: ${invalidKey.slice(0, 40)}`);
    }

    const lanCidr = config.get("ssh-lan-cidr") ?? DEFAULT_LAN_CIDR;
    if (!isValidCidr(lanCidr)) {
        throw new Error(`${configKey("ssh-lan-cidr")} must be an IPv4 CIDR, got "${lanCidr}"`);
    }

    const port = config.getNumber("ssh-port") ?? DEFAULT_CONFIG.sshPort;
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new Error(`${configKey("ssh-port")} must be a port number, got ${port}`);
    }

    return {
        authorizedKeys,
        lanCidr,
        port,
        permitRootLogin: config.getBoolean("ssh-permit-root-login") ?? DEFAULT_CONFIG.sshPermitRootLogin,
    };
}

function loadPackages(config: pulumi.Config): OptionalPackage[] {
    const selected: OptionalPackage[] = [];
    for (const item of readStringList(config, "packages", false)) {
        if (!isOptionalPackage(item)) {
            throw new Error(`Unknown package "${item}" in ${configKey("packages")}`);
        }
        if (!selected.includes(item)) {
            selected.push(item);
        }
    }
    return selected.sort();
}

function loadAutoUpdatesConfig(config: pulumi.Config): AutoUpdatesConfig {
    const rebootTime = config.get("auto-updates-reboot-time") ?? DEFAULT_CONFIG.rebootTime;
    if (!isValidTime(rebootTime)) {
        throw new Error(`${configKey("auto-updates-reboot-time")} must be HH:MM, got "${rebootTime}"`);
    }
    return {
        autoReboot: config.getBoolean("auto-updates-reboot") ?? DEFAULT_CONFIG.autoReboot,
        rebootTime,
    };
}

function loadDnsConfig(config: pulumi.Config): DnsConfig | undefined {
    const domain = config.get("domain");
    if (domain === undefined || domain.trim().length === 0) {
        return undefined;
    }

    const subdomains = readStringList(config, "dns-subdomains", false).map((s) => s.toLowerCase());
    const invalid = subdomains.find((s) => !isValidSubdomain(s));
    if (invalid !== undefined) {
        throw new Error(`Invalid subdomain "${invalid}" in ${configKey("dns-subdomains")}`);
    }

    return {
        domain: domain.trim(),
        zoneId: config.require("cloudflare-zone-id"),
        subdomains: [...new Set(subdomains)],
        verify: config.getBoolean("dns-verify") ?? DEFAULT_CONFIG.dnsVerify,
    };
}

/**
 * Loads and validates the complete host configuration
 * from Pulumi config values.
 */
export function getConfig(config: pulumi.Config = new pulumi.Config(CONFIG_NAMESPACE)): HostConfig {
    const adminUser = config.require("admin-user");
    if (!isValidUsername(adminUser)) {
        throw new Error(
            `${configKey("admin-user")} must be a non-root Linux username ` +
                `(lowercase letters, digits, hyphens, underscores), got "${adminUser}"`
        );
    }

    return {
        adminUser,
        ssh: loadSSHConfig(config),
        packages: loadPackages(config),
        autoUpdates: loadAutoUpdatesConfig(config),
        smbAutomount: config.getBoolean("smb-automount") ?? DEFAULT_CONFIG.smbAutomount,
        dns: loadDnsConfig(config),
    };
}

