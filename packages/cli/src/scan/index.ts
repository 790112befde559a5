/**
 * Secret scanner
 *
 * Searches a directory tree for strings listed in /etc/secrets/.ignore,
 * skipping what the directory's .gitignore excludes, so secrets do not end
 * up committed.
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { SECRET_PATHS, isNotFoundError } from "@hostkit/shared";
import { isExcluded, parseGitignore, type Exclusion } from "./exclusions.js";

export interface FileMatches {
    file: string;
    lines: string[];
}

export interface PatternMatches {
    pattern: string;
    files: FileMatches[];
}

export interface ScanResult {
    /** Every pattern, in file order */
    patterns: string[];
    /** Only patterns with at least one match */
    matches: PatternMatches[];
}

/**
 * Parses the pattern list: one pattern per line, trimmed, `#` comments
 */
export function parsePatternFile(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Reads the pattern list; a missing file is an error
 */
export async function readPatterns(path: string = SECRET_PATHS.ignorePatterns): Promise<string[]> {
    try {
        return parsePatternFile(await readFile(path, "utf-8"));
    } catch (error) {
        if (isNotFoundError(error)) {
            throw new Error(`Pattern file ${path} not found.`);
        }
        throw error;
    }
}

/**
 * Reads <directory>/.gitignore; only the .git/ exclusion when it is missing
 */
export async function readExclusions(directory: string): Promise<Exclusion[]> {
    try {
        return parseGitignore(await readFile(join(directory, ".gitignore"), "utf-8"));
    } catch (error) {
        if (isNotFoundError(error)) {
            return parseGitignore("");
        }
        throw error;
    }
}

/**
 * Lists regular files under a directory, sorted, minus exclusions
 */
export async function listFiles(directory: string, exclusions: Exclusion[]): Promise<string[]> {
    const files: string[] = [];
    // Paths keep the directory as given (`./.git/config` for "."), like find(1)
    const walk = async (dir: string): Promise<void> => {
        for (const entry of await readdir(dir, { withFileTypes: true })) {
            const path = dir === "/" ? `/${entry.name}` : `${dir}/${entry.name}`;
            if (entry.isDirectory()) {
                await walk(path);
            } else if (entry.isFile() && !isExcluded(path, exclusions)) {
                files.push(path);
            }
        }
    };
    await walk(directory.replace(/\/+$/, "") || "/");
    return files.sort();
}

/**
 * Patterns are regular expressions; ones that do not compile match literally
 */
export function compilePattern(pattern: string): RegExp {
    try {
        return new RegExp(pattern);
    } catch {
        return new RegExp(pattern.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"));
    }
}

/**
 * Finds every pattern in every file
 */
export async function scanFiles(patterns: string[], files: string[]): Promise<ScanResult> {
    const contents = new Map<string, string[]>();
    for (const file of files) {
        contents.set(file, (await readFile(file, "utf-8")).split(/\r?\n/));
    }

    const matches: PatternMatches[] = [];
    for (const pattern of patterns) {
        const regex = compilePattern(pattern);
        const found: FileMatches[] = [];
        for (const [file, lines] of contents) {
            const hits = lines.filter((line) => regex.test(line));
            if (hits.length > 0) {
                found.push({ file, lines: hits });
            }
        }
        if (found.length > 0) {
            matches.push({ pattern, files: found });
        }
    }
    return { patterns, matches };
}

/**
 * Reads patterns and exclusions, then scans the directory
 */
export async function scanDirectory(directory: string, patternFile?: string): Promise<ScanResult> {
    const patterns = await readPatterns(patternFile);
    const exclusions = await readExclusions(directory);
    return scanFiles(patterns, await listFiles(directory, exclusions));
}

/**
 * Renders matches and the summary line
 */
export function renderScanReport(result: ScanResult): string[] {
    if (result.matches.length === 0) {
        return ["No matches found for any patterns."];
    }

    const lines: string[] = [];
    for (const { pattern, files } of result.matches) {
        lines.push("", `Matches for: "${pattern}"`);
        for (const { file, lines: hits } of files) {
            lines.push("", `--- File: ${file} ---`, ...hits);
        }
    }
    lines.push(
        "",
        "=".repeat(54),
        `Summary: Found matches for ${result.matches.length} out of ${result.patterns.length} patterns.`
    );
    return lines;
}
