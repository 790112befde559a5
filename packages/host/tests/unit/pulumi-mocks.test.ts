/**
 * Pulumi mock tests for resource creation verification
 *
 * Uses pulumi.runtime.setMocks() to verify that setup functions
 * create the expected Pulumi resources without actually executing commands.
 *
 * These tests verify the "wiring" - that the right resources are created
 * with the right inputs, rather than testing command content
 * (which is covered by the pure function unit tests).
 */

import { describe, it, expect, beforeAll, beforeEach } from "vitest";
import * as pulumi from "@pulumi/pulumi";

// Track all resources created during mock execution
interface MockResource {
    name: string;
    type: string;
    inputs: Record<string, unknown>;
}

let createdResources: MockResource[] = [];

// Set up Pulumi mocks BEFORE any Pulumi resource code is imported
beforeAll(async () => {
    await pulumi.runtime.setMocks(
        {
            newResource(args: pulumi.runtime.MockResourceArgs): {
                id: string;
                state: Record<string, unknown>;
            } {
                createdResources.push({
                    name: args.name,
                    type: args.type,
                    inputs: args.inputs,
                });
                return {
                    id: `${args.name}-id`,
                    state: {
                        ...args.inputs,
                        stdout: "",
                        stderr: "",
                    },
                };
            },
            call(args: pulumi.runtime.MockCallArgs): Record<string, unknown> {
                return args.inputs;
            },
        },
        "hostkit", // project
        "test", // stack
        false // preview
    );
});

beforeEach(() => {
    createdResources = [];
});

function resourceNames(): string[] {
    return createdResources.map((r) => r.name);
}

describe("Pulumi Mock Tests - SSH Setup", () => {
    it("should create expected resources for SSH hardening", async () => {
        const { setupSSH } = await import("../../src/services/ssh/index.js");

        const result = setupSSH({
            adminUser: "alice",
            authorizedKeys: ["ssh-ed25519 AAAAtest alice@laptop"],
            lanCidr: "192.168.1.0/24",
            port: 22,
            permitRootLogin: true,
        });

        // Give Pulumi a tick to register resources
        await new Promise((resolve) => setTimeout(resolve, 100));

        expect(result.resources).toHaveLength(8);
        expect(resourceNames()).toEqual(
            expect.arrayContaining([
                "sshd-config-backup",
                "sshd-config",
                "ssh-dir-alice",
                "ssh-keypair-alice",
                "ssh-authorized-keys-alice",
                "ssh-validate-config",
                "ssh-restart-sshd",
                "ssh-verify",
            ])
        );
    });

    it("should create all resources as command:local:Command", async () => {
        const { setupSSH } = await import("../../src/services/ssh/index.js");

        setupSSH({
            adminUser: "bob",
            authorizedKeys: ["ssh-ed25519 AAAAtest bob@laptop"],
            lanCidr: "10.0.0.0/24",
            port: 22,
            permitRootLogin: false,
        });
        await new Promise((resolve) => setTimeout(resolve, 100));

        for (const resource of createdResources) {
            expect(resource.type).toBe("command:local:Command");
        }
    });
});

describe("Pulumi Mock Tests - Packages", () => {
    it("should install only critical packages when nothing is selected", async () => {
        const { setupPackages } = await import("../../src/services/packages/index.js");

        const result = setupPackages({ adminUser: "alice" });
        await new Promise((resolve) => setTimeout(resolve, 100));

        expect(result.resources).toHaveLength(2);
        expect(result.docker).toBeUndefined();
        expect(resourceNames()).toEqual(
            expect.arrayContaining(["install-critical-packages", "verify-packages"])
        );
    });

    it("should add the Docker repository and one step per scripted item", async () => {
        const { setupPackages } = await import("../../src/services/packages/index.js");

        const result = setupPackages({
            adminUser: "alice",
            packages: ["docker", "nvm", "plex", "certbot"],
        });
        await new Promise((resolve) => setTimeout(resolve, 100));

        expect(result.docker).toBeDefined();
        expect(resourceNames()).toEqual(
            expect.arrayContaining([
                "install-critical-packages",
                "docker-apt-repository",
                "install-apt-packages",
                "install-nvm",
                "install-plex",
                "verify-packages",
            ])
        );

        const aptStep = createdResources.find((r) => r.name === "install-apt-packages");
        expect(String(aptStep?.inputs.create)).toContain(
            "apt-get install -y containerd.io docker-buildx-plugin docker-ce docker-ce-cli docker-compose-plugin certbot"
        );
    });
});

describe("Pulumi Mock Tests - Auto-Updates", () => {
    it("should install, configure, enable and verify", async () => {
        const { setupAutoUpdates } = await import("../../src/services/auto-updates/index.js");

        const result = setupAutoUpdates({ autoReboot: true, rebootTime: "03:15" });
        await new Promise((resolve) => setTimeout(resolve, 100));

        expect(result.resources).toHaveLength(6);
        expect(resourceNames()).toEqual(
            expect.arrayContaining([
                "auto-updates-install",
                "unattended-upgrades-config",
                "auto-upgrades-config",
                "apt-listchanges-frontend",
                "enable-unattended-upgrades",
                "verify-auto-updates",
            ])
        );

        const enable = createdResources.find((r) => r.name === "enable-unattended-upgrades");
        expect(enable?.inputs.create).toBe(
            "systemctl daemon-reload && systemctl enable unattended-upgrades && systemctl restart unattended-upgrades"
        );
    });
});

describe("Pulumi Mock Tests - Automount", () => {
    it("should write the unit and enable it", async () => {
        const { setupAutomount } = await import("../../src/services/automount/index.js");

        setupAutomount();
        await new Promise((resolve) => setTimeout(resolve, 100));

        const enable = createdResources.find((r) => r.name === "enable-automount");
        expect(enable?.inputs.create).toBe(
            "systemctl daemon-reload && systemctl enable automount-on-start && systemctl start automount-on-start"
        );
        const unit = createdResources.find((r) => r.name === "automount-unit");
        expect(String(unit?.inputs.create)).toContain(
            "cat > /etc/systemd/system/automount-on-start.service << 'HOSTKIT_EOF'"
        );
    });
});

describe("Pulumi Mock Tests - Users and Secrets", () => {
    it("should check the admin user and install a sudoers entry", async () => {
        const { setupAdminUser } = await import("../../src/resources/admin-user.js");

        const result = setupAdminUser({ username: "alice" });
        await new Promise((resolve) => setTimeout(resolve, 100));

        expect(result.homeDir).toBe("$(getent passwd alice | cut -d: -f6)");
        const sudoers = createdResources.find((r) => r.name === "admin-user-sudoers-alice");
        expect(String(sudoers?.inputs.create)).toContain("echo 'alice ALL=(ALL) ALL' > \"$tmp\"");
        expect(sudoers?.inputs.delete).toBe("rm -f /etc/sudoers.d/alice");
    });

    it("should secure the secrets directory", async () => {
        const { setupSecretsDir } = await import("../../src/resources/secrets.js");

        const result = setupSecretsDir({ username: "alice" });
        await new Promise((resolve) => setTimeout(resolve, 100));

        expect(result.path).toBe("/etc/secrets");
        expect(resourceNames()).toContain("secrets-dir");
    });
});

describe("Pulumi Mock Tests - DNS", () => {
    it("should create one DNS-only CNAME per subdomain", async () => {
        const { setupDns } = await import("../../src/services/dns/index.js");

        const result = setupDns({
            domain: "example.com",
            zoneId: "test-zone-id",
            subdomains: ["dashboard", "jellyfin"],
            verify: false,
        });
        await new Promise((resolve) => setTimeout(resolve, 100));

        expect(result.hostnames).toEqual(["dashboard.example.com", "jellyfin.example.com"]);
        expect(Object.keys(result.records)).toEqual(["dashboard", "jellyfin"]);

        const record = createdResources.find((r) => r.name === "dns-dashboard");
        expect(record?.type).toBe("cloudflare:index/record:Record");
        expect(record?.inputs).toMatchObject({
            zoneId: "test-zone-id",
            name: "dashboard",
            type: "CNAME",
            content: "example.com",
            ttl: 3600,
            proxied: false,
            allowOverwrite: true,
            comment: "Managed by hostkit",
        });
        expect(resourceNames()).not.toContain("dns-propagation-check");
    });

    it("should add a propagation check when verification is on", async () => {
        const { setupDns } = await import("../../src/services/dns/index.js");

        const result = setupDns({
            domain: "example.com",
            zoneId: "test-zone-id",
            subdomains: ["auth"],
            verify: true,
        });
        await new Promise((resolve) => setTimeout(resolve, 100));

        expect(result.resources).toHaveLength(2);
        const check = createdResources.find((r) => r.name === "dns-propagation-check");
        expect(String(check?.inputs.create)).toContain("for name in auth.example.com; do");
    });
});
