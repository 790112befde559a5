/**
 * Unit tests for the admin user scripts
 */

import { describe, it, expect, vi } from "vitest";
import { execa } from "execa";

// Mock the command lib to avoid Pulumi resource creation
vi.mock("../../src/lib/command.js", () => ({
    runCommand: vi.fn(),
    writeFile: vi.fn(),
    enableService: vi.fn(),
}));

import {
    generateSudoersEntry,
    generateUserCheckScript,
    homeDirExpression,
} from "../../src/resources/admin-user.js";

describe("generateUserCheckScript", () => {
    it("should redirect id output the POSIX way", () => {
        const script = generateUserCheckScript("alice");

        expect(script).toContain('if ! id "alice" >/dev/null 2>&1; then');
        expect(script).not.toContain("&>");
    });

    it("should pass under sh for an existing user", async () => {
        const result = await execa("sh", ["-c", generateUserCheckScript("root")], { reject: false });

        expect(result.exitCode).toBe(0);
        expect(result.stdout).toBe("User root exists");
        expect(result.stderr).toBe("");
    });

    it("should fail under sh for a missing user", async () => {
        const result = await execa("sh", ["-c", generateUserCheckScript("hostkit-no-such-user")], {
            reject: false,
        });

        expect(result.exitCode).toBe(1);
        expect(result.stdout).toBe("");
        expect(result.stderr).toBe(
            "User hostkit-no-such-user does not exist. Create it first (adduser hostkit-no-such-user)."
        );
    });
});

describe("generateSudoersEntry", () => {
    it("should grant full sudo with a password", () => {
        expect(generateSudoersEntry("alice")).toBe("alice ALL=(ALL) ALL");
    });
});

describe("homeDirExpression", () => {
    it("should resolve the home directory from the passwd database", () => {
        expect(homeDirExpression("alice")).toBe("$(getent passwd alice | cut -d: -f6)");
    });
});
