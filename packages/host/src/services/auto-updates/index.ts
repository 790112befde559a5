/**
 * Auto-updates service
 *
 * Configures unattended-upgrades for automatic Debian security and
 * stable updates, picks an apt-listchanges frontend that works on this
 * host and checks the result with a dry run.
 */

import type * as pulumi from "@pulumi/pulumi";
import { runCommand, writeFile, enableService } from "../../lib/command.js";
import type { SetupAutoUpdatesOptions, SetupAutoUpdatesResult } from "./types.js";

export type { SetupAutoUpdatesOptions, SetupAutoUpdatesResult } from "./types.js";

export const UNATTENDED_UPGRADES_PATH = "/etc/apt/apt.conf.d/50unattended-upgrades";
export const AUTO_UPGRADES_PATH = "/etc/apt/apt.conf.d/20auto-upgrades";
export const LISTCHANGES_CONFIG_PATH = "/etc/apt/listchanges.conf";

/**
 * Output lines that mean the dry run worked
 */
export const DRY_RUN_SUCCESS_MARKERS = [
    "No packages found that can be upgraded unattended",
    "Packages that will be upgraded:",
];

/**
 * Generates the unattended-upgrades configuration
 */
export function generateUnattendedUpgradesConfig(options: {
    autoReboot: boolean;
    rebootTime?: string;
}): string {
    const { autoReboot, rebootTime = "02:00" } = options;

    return `
// Unattended-Upgrades configuration
// Managed by hostkit - Do not edit manually

Unattended-Upgrade::Origins-Pattern {
    // Security updates
    "origin=Debian,codename=\${distro_codename},label=Debian-Security";
    "origin=Debian,codename=\${distro_codename}-security,label=Debian-Security";

    // Stable updates
    "origin=Debian,codename=\${distro_codename},label=Debian";
    "origin=Debian,codename=\${distro_codename}-updates,label=Debian";
};

// Never hold anything back
Unattended-Upgrade::Package-Blacklist {
};

// Split the upgrade into the smallest possible chunks
Unattended-Upgrade::MinimalSteps "true";

// Automatic reboot if required
Unattended-Upgrade::Automatic-Reboot "${autoReboot}";
Unattended-Upgrade::Automatic-Reboot-Time "${rebootTime}";

// Log to syslog
Unattended-Upgrade::SyslogEnable "true";

// Cleanup
Unattended-Upgrade::Remove-Unused-Kernel-Packages "true";
Unattended-Upgrade::Remove-New-Unused-Dependencies "true";
Unattended-Upgrade::Remove-Unused-Dependencies "false";

// Recover from interrupted dpkg runs
Unattended-Upgrade::AutoFixInterruptedDpkg "true";

Unattended-Upgrade::Allow-downgrade "false";
`.trim();
}

/**
 * Generates the apt auto-upgrades configuration
 */
export function generateAutoUpgradesConfig(): string {
    return `
// Enable automatic updates
APT::Periodic::Update-Package-Lists "1";
APT::Periodic::Download-Upgradeable-Packages "1";
APT::Periodic::Unattended-Upgrade "1";
APT::Periodic::AutocleanInterval "7";
`.trim();
}

/**
 * Generates the script choosing the apt-listchanges frontend:
 * mail when a mail transport is installed, pager otherwise
 */
export function generateListchangesScript(): string {
    return `
if command -v sendmail >/dev/null || command -v postfix >/dev/null || command -v exim4 >/dev/null; then
    FRONTEND=mail
else
    FRONTEND=pager
fi
if [ -f ${LISTCHANGES_CONFIG_PATH} ]; then
    sed -i "s/^frontend=.*/frontend=$FRONTEND/" ${LISTCHANGES_CONFIG_PATH}
fi
echo "apt-listchanges frontend: $FRONTEND"
`.trim();
}

/**
 * Generates the dry-run test script
 */
export function generateDryRunScript(): string {
    const pattern = DRY_RUN_SUCCESS_MARKERS.join("|");
    return `
OUTPUT=$(unattended-upgrades --dry-run --debug 2>&1)
if echo "$OUTPUT" | grep -Eq "${pattern}"; then
    echo "unattended-upgrades dry run: OK"
else
    echo "$OUTPUT" | tail -20
    echo "unattended-upgrades dry run did not report an upgrade plan" >&2
    exit 1
fi
`.trim();
}

/**
 * Sets up automatic updates
 *
 * - Installs unattended-upgrades and apt-listchanges
 * - Writes the periodic and unattended-upgrades configuration
 * - Enables the service and verifies it with a dry run
 */
export function setupAutoUpdates(options: SetupAutoUpdatesOptions = {}): SetupAutoUpdatesResult {
    const { autoReboot = false, rebootTime = "02:00", dependsOn = [] } = options;
    const resources: pulumi.Resource[] = [];

    const install = runCommand({
        name: "auto-updates-install",
        create: `
            export DEBIAN_FRONTEND=noninteractive
            apt-get install -y unattended-upgrades apt-listchanges
            apt-get install -y apt-config-auto-update || echo "apt-config-auto-update not available, continuing"
        `.trim(),
        dependsOn,
    });
    resources.push(install);

    const writeUnattendedConfig = writeFile({
        name: "unattended-upgrades-config",
        path: UNATTENDED_UPGRADES_PATH,
        content: generateUnattendedUpgradesConfig({ autoReboot, rebootTime }),
        removeOnDelete: false,
        dependsOn: [install],
    });
    resources.push(writeUnattendedConfig);

    const writeAutoUpgradesConfig = writeFile({
        name: "auto-upgrades-config",
        path: AUTO_UPGRADES_PATH,
        content: generateAutoUpgradesConfig(),
        dependsOn: [install],
    });
    resources.push(writeAutoUpgradesConfig);

    const listchanges = runCommand({
        name: "apt-listchanges-frontend",
        create: generateListchangesScript(),
        dependsOn: [install],
    });
    resources.push(listchanges);

    const enableAutoUpdates = enableService({
        name: "enable-unattended-upgrades",
        service: "unattended-upgrades",
        restart: true,
        dependsOn: [writeUnattendedConfig, writeAutoUpgradesConfig, listchanges],
    });
    resources.push(enableAutoUpdates);

    const verifyAutoUpdates = runCommand({
        name: "verify-auto-updates",
        create: `
            systemctl is-active --quiet unattended-upgrades || { echo "unattended-upgrades is not running" >&2; exit 1; }
            systemctl is-enabled --quiet unattended-upgrades || { echo "unattended-upgrades is not enabled" >&2; exit 1; }
            ${generateDryRunScript()}
            echo "Auto-updates configured successfully"
        `.trim(),
        dependsOn: [enableAutoUpdates],
    });
    resources.push(verifyAutoUpdates);

    return { resources };
}
