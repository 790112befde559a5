/**
 * hostkit - Host Pulumi Program
 *
 * Configures a home-lab Debian server:
 * 1. Admin user with sudo and a root:secrets secrets directory
 * 2. Critical and optional packages (Docker, Plex, 1Password, NVM, ...)
 * 3. SSH hardening limited to the LAN
 * 4. Automatic security updates
 * 5. Boot-time automount for network shares
 * 6. Cloudflare CNAME records for the compose stack
 *
 * Run with: pulumi up (as root, on the host itself)
 */

import { assertSupportedPlatform, logPlatformBanner } from "@hostkit/shared";
import { getConfig } from "./config/index.js";

// Resources
import { setupAdminUser, addUserToDockerGroup } from "./resources/admin-user.js";
import { setupSecretsDir } from "./resources/secrets.js";

// Services
import { setupPackages } from "./services/packages/index.js";
import { setupSSH } from "./services/ssh/index.js";
import { setupAutoUpdates } from "./services/auto-updates/index.js";
import { setupAutomount } from "./services/automount/index.js";
import { setupDns } from "./services/dns/index.js";

// ============================================================================
// Platform Check and Banner
// ============================================================================

logPlatformBanner("hostkit");
assertSupportedPlatform();

const config = getConfig();

console.log(`Admin user: ${config.adminUser}`);
console.log(`SSH LAN range: ${config.ssh.lanCidr}`);
console.log(`Optional packages: ${config.packages.length > 0 ? config.packages.join(", ") : "(none)"}`);
console.log("");

// ============================================================================
// Phase 1: Packages
// ============================================================================

const packages = setupPackages({
    adminUser: config.adminUser,
    packages: config.packages,
});

// ============================================================================
// Phase 2: Users and Secrets
// ============================================================================

const adminUser = setupAdminUser({
    username: config.adminUser,
    dependsOn: [packages.critical],
});

const secrets = setupSecretsDir({
    username: config.adminUser,
    dependsOn: adminUser.resources,
});

if (packages.docker) {
    addUserToDockerGroup({
        username: config.adminUser,
        dependsOn: [packages.docker, ...adminUser.resources],
    });
}

// ============================================================================
// Phase 3: Security Hardening
// ============================================================================

setupSSH({
    adminUser: config.adminUser,
    ...config.ssh,
    dependsOn: [...adminUser.resources, packages.critical],
});

setupAutoUpdates({
    autoReboot: config.autoUpdates.autoReboot,
    rebootTime: config.autoUpdates.rebootTime,
    dependsOn: packages.resources,
});

// ============================================================================
// Phase 4: Network Shares and DNS
// ============================================================================

if (config.smbAutomount) {
    setupAutomount({
        dependsOn: [packages.critical, secrets.resource],
    });
}

const dns = config.dns ? setupDns(config.dns) : undefined;

// ============================================================================
// Exports
// ============================================================================

export const outputs = {
    adminUser: config.adminUser,
    packages: config.packages,
    sshLanCidr: config.ssh.lanCidr,
    secretsDir: secrets.path,
    dnsRecords: dns?.hostnames ?? [],
    commands: {
        checkSSH: "sudo sshd -T | grep -E 'passwordauthentication|permitrootlogin|allowusers'",
        checkAutoUpdates: "systemctl status unattended-upgrades",
        checkAutomount: "systemctl status automount-on-start",
        mountShares: "npm run hostkit -- smb mount",
    },
};
