/**
 * Unit tests for auto-updates configuration generation
 *
 * Tests unattended-upgrades and apt auto-upgrades config generation.
 */

import { describe, it, expect, vi } from "vitest";

// Mock the command lib to avoid Pulumi resource creation
vi.mock("../../src/lib/command.js", () => ({
    runCommand: vi.fn(),
    writeFile: vi.fn(),
    enableService: vi.fn(),
}));

import {
    generateUnattendedUpgradesConfig,
    generateAutoUpgradesConfig,
    generateListchangesScript,
    generateDryRunScript,
} from "../../src/services/auto-updates/index.js";

describe("Auto-Updates Config Generation", () => {
    describe("generateUnattendedUpgradesConfig", () => {
        it("should include Debian security origins", () => {
            const config = generateUnattendedUpgradesConfig({ autoReboot: false });

            expect(config).toContain(
                '"origin=Debian,codename=${distro_codename},label=Debian-Security";'
            );
            expect(config).toContain(
                '"origin=Debian,codename=${distro_codename}-security,label=Debian-Security";'
            );
        });

        it("should include Debian stable and updates origins", () => {
            const config = generateUnattendedUpgradesConfig({ autoReboot: false });

            expect(config).toContain('"origin=Debian,codename=${distro_codename},label=Debian";');
            expect(config).toContain(
                '"origin=Debian,codename=${distro_codename}-updates,label=Debian";'
            );
        });

        it("should use Origins-Pattern rather than Allowed-Origins", () => {
            const config = generateUnattendedUpgradesConfig({ autoReboot: false });

            expect(config).toContain("Unattended-Upgrade::Origins-Pattern {");
            expect(config).not.toContain("Allowed-Origins");
        });

        it("should disable auto-reboot at 02:00 by default", () => {
            const config = generateUnattendedUpgradesConfig({ autoReboot: false });

            expect(config).toContain('Unattended-Upgrade::Automatic-Reboot "false";');
            expect(config).toContain('Unattended-Upgrade::Automatic-Reboot-Time "02:00";');
        });

        it("should enable auto-reboot at the configured time", () => {
            const config = generateUnattendedUpgradesConfig({ autoReboot: true, rebootTime: "04:30" });

            expect(config).toContain('Unattended-Upgrade::Automatic-Reboot "true";');
            expect(config).toContain('Unattended-Upgrade::Automatic-Reboot-Time "04:30";');
        });

        it("should clean up kernels and new dependencies but keep old ones", () => {
            const config = generateUnattendedUpgradesConfig({ autoReboot: false });

            expect(config).toContain('Unattended-Upgrade::Remove-Unused-Kernel-Packages "true";');
            expect(config).toContain('Unattended-Upgrade::Remove-New-Unused-Dependencies "true";');
            expect(config).toContain('Unattended-Upgrade::Remove-Unused-Dependencies "false";');
        });

        it("should recover dpkg, log to syslog and never downgrade", () => {
            const config = generateUnattendedUpgradesConfig({ autoReboot: false });

            expect(config).toContain('Unattended-Upgrade::AutoFixInterruptedDpkg "true";');
            expect(config).toContain('Unattended-Upgrade::SyslogEnable "true";');
            expect(config).toContain('Unattended-Upgrade::MinimalSteps "true";');
            expect(config).toContain('Unattended-Upgrade::Allow-downgrade "false";');
        });

        it("should have an empty package blacklist", () => {
            const config = generateUnattendedUpgradesConfig({ autoReboot: false });

            expect(config).toContain("Unattended-Upgrade::Package-Blacklist {\n};");
        });
    });

    describe("generateAutoUpgradesConfig", () => {
        it("should enable every periodic task", () => {
            expect(generateAutoUpgradesConfig()).toBe(
                [
                    "// Enable automatic updates",
                    'APT::Periodic::Update-Package-Lists "1";',
                    'APT::Periodic::Download-Upgradeable-Packages "1";',
                    'APT::Periodic::Unattended-Upgrade "1";',
                    'APT::Periodic::AutocleanInterval "7";',
                ].join("\n")
            );
        });
    });

    describe("generateListchangesScript", () => {
        it("should prefer mail when a mail transport exists", () => {
            const script = generateListchangesScript();

            expect(script).toContain(
                "if command -v sendmail >/dev/null || command -v postfix >/dev/null || command -v exim4 >/dev/null; then\n    FRONTEND=mail\nelse\n    FRONTEND=pager\nfi"
            );
            expect(script).toContain(
                'sed -i "s/^frontend=.*/frontend=$FRONTEND/" /etc/apt/listchanges.conf'
            );
        });
    });

    describe("generateDryRunScript", () => {
        it("should accept either dry-run success message", () => {
            expect(generateDryRunScript()).toContain(
                'grep -Eq "No packages found that can be upgraded unattended|Packages that will be upgraded:"'
            );
        });
    });
});
