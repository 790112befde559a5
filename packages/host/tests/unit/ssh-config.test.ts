/**
 * Unit tests for SSH configuration generation
 */

import { describe, it, expect, vi } from "vitest";

// Mock the command lib to avoid Pulumi resource creation
vi.mock("../../src/lib/command.js", () => ({
    runCommand: vi.fn(),
    writeFile: vi.fn(),
    enableService: vi.fn(),
}));

import { generateAuthorizedKeys, generateSSHDConfig, setupSSH } from "../../src/services/ssh/index.js";

const BASE_OPTIONS = {
    adminUser: "alice",
    lanCidr: "192.168.1.0/24",
    port: 22,
    permitRootLogin: true,
};

describe("SSH Config Generation", () => {
    describe("generateSSHDConfig", () => {
        it("should include the drop-in directory first", () => {
            const lines = generateSSHDConfig(BASE_OPTIONS).split("\n");
            const firstSetting = lines.find((line) => line.length > 0 && !line.startsWith("#"));

            expect(firstSetting).toBe("Include /etc/ssh/sshd_config.d/*.conf");
        });

        it("should disable password authentication and limit auth tries", () => {
            const config = generateSSHDConfig(BASE_OPTIONS);

            expect(config).toContain("PasswordAuthentication no\n");
            expect(config).toContain("PubkeyAuthentication yes\n");
            expect(config).toContain("MaxAuthTries 3\n");
            expect(config).toContain("LoginGraceTime 30\n");
            expect(config).toContain("X11Forwarding no\n");
        });

        it("should keep idle sessions alive for ten minutes at most", () => {
            const config = generateSSHDConfig(BASE_OPTIONS);

            expect(config).toContain("ClientAliveInterval 300\nClientAliveCountMax 2\n");
        });

        it("should allow the admin user and root when root login is permitted", () => {
            const config = generateSSHDConfig(BASE_OPTIONS);

            expect(config).toContain("PermitRootLogin yes\n");
            expect(config).toContain("AllowUsers alice root\n");
        });

        it("should drop root entirely when root login is disabled", () => {
            const config = generateSSHDConfig({ ...BASE_OPTIONS, permitRootLogin: false });

            expect(config).toContain("PermitRootLogin no\n");
            expect(config).toContain("AllowUsers alice\n");
            expect(config).toContain("    PermitRootLogin no\n");
        });

        it("should use the configured port", () => {
            expect(generateSSHDConfig({ ...BASE_OPTIONS, port: 2222 })).toContain("Port 2222\n");
        });

        it("should allow the LAN and deny everyone else", () => {
            const config = generateSSHDConfig({ ...BASE_OPTIONS, lanCidr: "10.0.0.0/8" });

            expect(config).toContain(
                "Match Address 10.0.0.0/8\n    PermitRootLogin yes\n    PubkeyAuthentication yes\n"
            );
            expect(config).toContain("Match Address *,!10.0.0.0/8\n    DenyUsers *\n");
        });

        it("should put Match blocks after every global setting", () => {
            const config = generateSSHDConfig(BASE_OPTIONS);

            expect(config.indexOf("AllowUsers")).toBeLessThan(config.indexOf("Match Address"));
        });
    });

    describe("generateAuthorizedKeys", () => {
        it("should list each key once under a header", () => {
            const content = generateAuthorizedKeys([
                "ssh-ed25519 AAAAtest1 laptop",
                " ssh-ed25519 AAAAtest1 laptop ",
                "ssh-rsa AAAAtest2 desktop",
                "",
            ]);

            expect(content).toBe(
                [
                    "# Authorized SSH keys",
                    "# Managed by hostkit - Do not edit manually",
                    "",
                    "ssh-ed25519 AAAAtest1 laptop",
                    "ssh-rsa AAAAtest2 desktop",
                    "",
                ].join("\n")
            );
        });
    });

    describe("setupSSH", () => {
        it("should throw if no authorized keys provided", () => {
            expect(() => setupSSH({ ...BASE_OPTIONS, authorizedKeys: [] })).toThrow(
                "SSH hardening requires at least one authorized key"
            );
        });
    });
});
