/**
 * Unit tests for the secret scanner
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
    globToRegExp,
    isExcluded,
    parseGitignore,
    translateGitignoreLine,
} from "../../src/scan/exclusions.js";
import {
    compilePattern,
    parsePatternFile,
    readPatterns,
    renderScanReport,
    scanDirectory,
} from "../../src/scan/index.js";

describe("globToRegExp()", () => {
    it("should translate shell wildcards", () => {
        expect(globToRegExp("*.log").test("build.log")).toBe(true);
        expect(globToRegExp("*.log").test("build.log.gz")).toBe(false);
        expect(globToRegExp("file?.txt").test("file1.txt")).toBe(true);
        expect(globToRegExp("[ab].txt").test("b.txt")).toBe(true);
        expect(globToRegExp("[!ab].txt").test("b.txt")).toBe(false);
        expect(globToRegExp("a+b.txt").test("a+b.txt")).toBe(true);
    });
});

describe("translateGitignoreLine()", () => {
    it("should skip blanks, comments and negations", () => {
        expect(translateGitignoreLine("")).toBeNull();
        expect(translateGitignoreLine("# build output")).toBeNull();
        expect(translateGitignoreLine("!keep.log")).toBeNull();
    });

    it("should classify entries", () => {
        expect(translateGitignoreLine("node_modules/")?.kind).toBe("path");
        expect(translateGitignoreLine(".*")?.kind).toBe("hidden");
        expect(translateGitignoreLine(".env")?.kind).toBe("name");
        expect(translateGitignoreLine("*.iso")?.kind).toBe("name");
        expect(translateGitignoreLine("  dist  ")?.pattern).toBe("dist");
    });

    it("should drop a leading **/ from wildcard entries", () => {
        const exclusion = translateGitignoreLine("**/*.runtime");

        expect(exclusion?.kind).toBe("name");
        expect(exclusion?.matcher.test("app.runtime")).toBe(true);
    });
});

describe("isExcluded()", () => {
    const exclusions = parseGitignore("node_modules/\n.*\n*.iso\nsecrets.txt\n");

    it("should always exclude .git", () => {
        expect(parseGitignore("")[0]?.pattern).toBe(".git/");
        expect(isExcluded("./repo/.git/config", parseGitignore(""))).toBe(true);
    });

    it("should treat bare relative paths as find does", () => {
        const hidden = parseGitignore(".*\n");

        expect(isExcluded(".git/config", parseGitignore(""))).toBe(true);
        expect(isExcluded(".env", hidden)).toBe(true);
        expect(isExcluded("src/index.ts", hidden)).toBe(false);
    });

    it("should apply path, hidden and name rules", () => {
        expect(isExcluded("./node_modules/pkg/index.js", exclusions)).toBe(true);
        expect(isExcluded("./src/.env", exclusions)).toBe(true);
        expect(isExcluded("./images/debian.iso", exclusions)).toBe(true);
        expect(isExcluded("./config/secrets.txt", exclusions)).toBe(true);
        expect(isExcluded("./src/index.ts", exclusions)).toBe(false);
    });
});

describe("patterns", () => {
    it("should trim lines and drop blanks and comments", () => {
        expect(parsePatternFile("# tokens\n\n  test-secret  \nhunter2\n")).toEqual([
            "test-secret",
            "hunter2",
        ]);
    });

    it("should treat patterns that are not valid expressions literally", () => {
        expect(compilePattern("api[key").test("the api[key value")).toBe(true);
        expect(compilePattern("tok.n").test("token")).toBe(true);
    });

    it("should fail when the pattern file is missing", async () => {
        await expect(readPatterns("/nonexistent/hostkit/.ignore")).rejects.toThrow(
            "Pattern file /nonexistent/hostkit/.ignore not found."
        );
    });
});

describe("scanDirectory()", () => {
    let root: string;
    let tree: string;
    let patternFile: string;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), "hostkit-scan-"));
        tree = join(root, "tree");
        patternFile = join(root, "patterns");

        await mkdir(join(tree, "build"), { recursive: true });
        await mkdir(join(tree, ".git"), { recursive: true });
        await writeFile(join(tree, "config.env"), "API_KEY=test-secret\nOTHER=1\n");
        await writeFile(join(tree, "notes.md"), "nothing here\n");
        await writeFile(join(tree, "build", "output.txt"), "test-secret in build output\n");
        await writeFile(join(tree, "debug.log"), "test-secret in a log\n");
        await writeFile(join(tree, ".git", "config"), "test-secret\n");
        await writeFile(join(tree, ".gitignore"), "build/\n*.log\n!keep.log\n");
        await writeFile(patternFile, "# secrets\n\ntest-secret\n  unused-token  \n");
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it("should report matches outside excluded paths", async () => {
        const result = await scanDirectory(tree, patternFile);

        expect(result.patterns).toEqual(["test-secret", "unused-token"]);
        expect(result.matches).toEqual([
            {
                pattern: "test-secret",
                files: [{ file: join(tree, "config.env"), lines: ["API_KEY=test-secret"] }],
            },
        ]);
        expect(renderScanReport(result)).toEqual([
            "",
            'Matches for: "test-secret"',
            "",
            `--- File: ${join(tree, "config.env")} ---`,
            "API_KEY=test-secret",
            "",
            "=".repeat(54),
            "Summary: Found matches for 1 out of 2 patterns.",
        ]);
    });

    it("should list paths under ./ and skip .git when scanning the working directory", async () => {
        await writeFile(join(tree, ".env"), "TOKEN=test-secret\n");
        const previous = process.cwd();
        process.chdir(tree);
        try {
            const result = await scanDirectory(".", patternFile);

            expect(result.matches).toEqual([
                {
                    pattern: "test-secret",
                    files: [
                        { file: "./.env", lines: ["TOKEN=test-secret"] },
                        { file: "./config.env", lines: ["API_KEY=test-secret"] },
                    ],
                },
            ]);
        } finally {
            process.chdir(previous);
        }
    });

    it("should skip top-level dotfiles when .gitignore lists .*", async () => {
        await writeFile(join(tree, ".env"), "TOKEN=test-secret\n");
        await writeFile(join(tree, ".gitignore"), "build/\n*.log\n.*\n");
        const previous = process.cwd();
        process.chdir(tree);
        try {
            const result = await scanDirectory(".", patternFile);

            expect(result.matches).toEqual([
                {
                    pattern: "test-secret",
                    files: [{ file: "./config.env", lines: ["API_KEY=test-secret"] }],
                },
            ]);
        } finally {
            process.chdir(previous);
        }
    });

    it("should say so when nothing matches", async () => {
        await writeFile(patternFile, "no-such-value\n");

        const result = await scanDirectory(tree, patternFile);

        expect(renderScanReport(result)).toEqual(["No matches found for any patterns."]);
    });
});
