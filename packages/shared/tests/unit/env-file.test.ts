/**
 * Unit tests for env file helpers
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { parseEnvFile, readEnvFile, writeSecretFile } from "../../src/env-file.js";

describe("parseEnvFile", () => {
    it("should parse simple KEY=VALUE lines", () => {
        const env = parseEnvFile("SMB_HOST_1=nas.home.arpa\nSMB_HOST_1_USER=media\n");

        expect([...env.entries()]).toEqual([
            ["SMB_HOST_1", "nas.home.arpa"],
            ["SMB_HOST_1_USER", "media"],
        ]);
    });

    it("should skip comments and blank lines", () => {
        const env = parseEnvFile("# comment\n\n   \nKEY=value\n  # indented comment\n");

        expect([...env.keys()]).toEqual(["KEY"]);
    });

    it("should strip a leading export and trim keys and values", () => {
        const env = parseEnvFile("export  ACME_EMAIL =  admin@example.com  ");

        expect(env.get("ACME_EMAIL")).toBe("admin@example.com");
    });

    it("should strip matching surrounding quotes", () => {
        const env = parseEnvFile(`A="double quoted"\nB='single quoted'\nC="unbalanced'`);

        expect(env.get("A")).toBe("double quoted");
        expect(env.get("B")).toBe("single quoted");
        expect(env.get("C")).toBe(`"unbalanced'`);
    });

    it("should split on the first equals sign only", () => {
        const env = parseEnvFile("PASSWORD=a=b=c");

        expect(env.get("PASSWORD")).toBe("a=b=c");
    });

    it("should ignore lines without an equals sign", () => {
        const env = parseEnvFile("not an assignment\nKEY=1");

        expect(env.size).toBe(1);
    });

    it("should keep the first position when a key repeats", () => {
        const env = parseEnvFile("A=1\nB=2\nA=3");

        expect([...env.entries()]).toEqual([
            ["A", "3"],
            ["B", "2"],
        ]);
    });

    it("should drop an inline comment after an unquoted value", () => {
        const env = parseEnvFile(`A=plain # note\nB="kept # inside quotes"`);

        expect(env.get("A")).toBe("plain");
        expect(env.get("B")).toBe("kept # inside quotes");
    });

    it("should handle CRLF line endings", () => {
        const env = parseEnvFile("A=1\r\nB=2\r\n");

        expect(env.get("A")).toBe("1");
        expect(env.get("B")).toBe("2");
    });
});

describe("readEnvFile / writeSecretFile", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "hostkit-env-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it("should return null for a missing file", async () => {
        expect(await readEnvFile(join(dir, "missing"))).toBeNull();
    });

    it("should write a file with mode 640 and read it back", async () => {
        const path = join(dir, "nested", ".docker");

        await writeSecretFile(path, "ACME_EMAIL=admin@example.com\n");

        expect(await readFile(path, "utf-8")).toBe("ACME_EMAIL=admin@example.com\n");
        expect((await stat(path)).mode & 0o777).toBe(0o640);
        const env = await readEnvFile(path);
        expect(env?.get("ACME_EMAIL")).toBe("admin@example.com");
    });

    it("should apply the mode to an existing file", async () => {
        const path = join(dir, "creds");
        await writeSecretFile(path, "a", { mode: 0o644 });

        await writeSecretFile(path, "b", { mode: 0o600 });

        expect((await stat(path)).mode & 0o777).toBe(0o600);
    });
});
