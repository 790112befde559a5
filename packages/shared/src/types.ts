/**
 * Shared configuration types and constants
 *
 * Used by both the Pulumi host program and the CLI, kept here so the two
 * agree on config keys, package ids and secret file locations.
 */

/**
 * Pulumi config namespace (`pulumi config set hostkit:<key>`)
 */
export const CONFIG_NAMESPACE = "hostkit";

/**
 * Default LAN range allowed to log in over SSH
 */
export const DEFAULT_LAN_CIDR = "192.168.1.0/24";

/**
 * Group that owns everything under the secrets directory
 */
export const SECRETS_GROUP = "secrets";

/**
 * Well-known secret file locations
 */
export const SECRET_PATHS = {
    dir: "/etc/secrets",
    smb: "/etc/secrets/.smb",
    docker: "/etc/secrets/.docker",
    ignorePatterns: "/etc/secrets/.ignore",
} as const;

/**
 * Path of the per-host secrets env file (`/etc/secrets/.<hostname>`)
 */
export function hostSecretsPath(hostname: string): string {
    return `${SECRET_PATHS.dir}/.${hostname}`;
}

/**
 * Optional software the host program knows how to install
 */
export const OPTIONAL_PACKAGES = [
    "1password-cli",
    "bitwarden-cli",
    "certbot",
    "cmake",
    "docker",
    "fail2ban",
    "fdupes",
    "ffmpeg",
    "nginx",
    "nodejs",
    "npm",
    "nvm",
    "pandoc",
    "plex",
] as const;

export type OptionalPackage = (typeof OPTIONAL_PACKAGES)[number];

/**
 * Type guard for optional package ids
 */
export function isOptionalPackage(value: string): value is OptionalPackage {
    return OPTIONAL_PACKAGES.some((pkg) => pkg === value);
}

/**
 * SSH configuration
 */
export interface SSHConfig {
    /** Authorized public keys for the admin user */
    authorizedKeys: string[];
    /** LAN range that may log in (root included) */
    lanCidr: string;
    /** sshd listen port */
    port: number;
    /** Whether root may log in from the LAN */
    permitRootLogin: boolean;
}

/**
 * Automatic updates configuration
 */
export interface AutoUpdatesConfig {
    /** Reboot automatically when an update requires it */
    autoReboot: boolean;
    /** Time of day for automatic reboots (HH:MM) */
    rebootTime: string;
}

/**
 * Cloudflare DNS configuration
 */
export interface DnsConfig {
    /** Apex domain the CNAME records point at */
    domain: string;
    /** Cloudflare zone id of the domain */
    zoneId: string;
    /** Subdomains to alias to the domain */
    subdomains: string[];
    /** Wait for the records to resolve after creating them */
    verify: boolean;
}

/**
 * Complete host configuration
 */
export interface HostConfig {
    /** Non-root administrator account */
    adminUser: string;
    ssh: SSHConfig;
    /** Optional software to install */
    packages: OptionalPackage[];
    autoUpdates: AutoUpdatesConfig;
    /** Install the boot-time network automount unit */
    smbAutomount: boolean;
    /** Present only when a domain is configured */
    dns?: DnsConfig;
}
