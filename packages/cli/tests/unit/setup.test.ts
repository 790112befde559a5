/**
 * Unit tests for the setup wizard's config mapping
 */

import { describe, it, expect } from "vitest";
import { buildConfigEntries, splitList, type SetupAnswers } from "../../src/commands/setup.js";

const ANSWERS: SetupAnswers = {
    adminUser: "alice",
    sshKeys: ["ssh-ed25519 AAAAtest alice@laptop"],
    lanCidr: "192.168.1.0/24",
    packages: ["docker", "nodejs"],
    autoReboot: false,
    rebootTime: "02:00",
    domain: "",
    zoneId: "",
    apiToken: "",
    subdomains: [],
};

describe("splitList()", () => {
    it("should split on commas and newlines and drop blanks", () => {
        expect(splitList(" a, b,,\nc \n")).toEqual(["a", "b", "c"]);
    });
});

describe("buildConfigEntries()", () => {
    it("should write the base keys under the hostkit namespace", () => {
        expect(buildConfigEntries(ANSWERS)).toEqual([
            { key: "hostkit:admin-user", value: "alice" },
            {
                key: "hostkit:ssh-authorized-keys",
                value: '["ssh-ed25519 AAAAtest alice@laptop"]',
            },
            { key: "hostkit:ssh-lan-cidr", value: "192.168.1.0/24" },
            { key: "hostkit:packages", value: '["docker","nodejs"]' },
            { key: "hostkit:auto-updates-reboot", value: "false" },
        ]);
    });

    it("should add the reboot time and DNS keys when used", () => {
        const entries = buildConfigEntries({
            ...ANSWERS,
            autoReboot: true,
            rebootTime: "04:30",
            domain: "home.example.com",
            zoneId: "zone-123",
            apiToken: "test-secret",
            subdomains: ["git", "media"],
        });

        expect(entries.slice(4)).toEqual([
            { key: "hostkit:auto-updates-reboot", value: "true" },
            { key: "hostkit:auto-updates-reboot-time", value: "04:30" },
            { key: "hostkit:domain", value: "home.example.com" },
            { key: "hostkit:cloudflare-zone-id", value: "zone-123" },
            { key: "hostkit:dns-subdomains", value: '["git","media"]' },
            { key: "cloudflare:apiToken", value: "test-secret", secret: true },
        ]);
    });

    it("should keep the current API token when none is entered", () => {
        const entries = buildConfigEntries({ ...ANSWERS, domain: "home.example.com", zoneId: "zone-123" });

        expect(entries.map((e) => e.key)).not.toContain("cloudflare:apiToken");
    });
});
