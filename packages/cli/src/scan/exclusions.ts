/**
 * .gitignore translation for the secret scanner
 *
 * Not a full gitignore implementation: each entry becomes one exclusion
 * rule in the style of find(1) -name / -path tests.
 */

import { basename } from "node:path";

export type ExclusionKind = "path" | "hidden" | "name";

export interface Exclusion {
    kind: ExclusionKind;
    /** Entry as written in .gitignore (after trimming) */
    pattern: string;
    matcher: RegExp;
}

/**
 * Converts a shell wildcard (`*`, `?`, `[...]`) into an anchored RegExp
 */
export function globToRegExp(glob: string): RegExp {
    let source = "";
    for (let i = 0; i < glob.length; i++) {
        const char = glob.charAt(i);
        if (char === "*") {
            source += ".*";
        } else if (char === "?") {
            source += ".";
        } else if (char === "[") {
            const end = glob.indexOf("]", i + 1);
            if (end === -1) {
                source += "\\[";
            } else {
                const body = glob.slice(i + 1, end).replace(/^!/, "^").replace(/\\/g, "\\\\");
                source += `[${body}]`;
                i = end;
            }
        } else {
            source += char.replace(/[.+^${}()|\\/]/g, "\\$&");
        }
    }
    return new RegExp(`^${source}$`, "s");
}

/**
 * Always excluded: the repository metadata directory
 */
export const GIT_DIR_EXCLUSION: Exclusion = {
    kind: "path",
    pattern: ".git/",
    matcher: globToRegExp("*/.git/*"),
};

/**
 * Translates one .gitignore line; null for blanks, comments and negations
 */
export function translateGitignoreLine(raw: string): Exclusion | null {
    const line = raw.trim();
    if (!line || line.startsWith("#") || line.startsWith("!")) {
        return null;
    }
    const name = line.startsWith("**/") ? line.slice("**/".length) : line;
    if (name.includes("/")) {
        return { kind: "path", pattern: line, matcher: globToRegExp(`*${line}*`) };
    }
    if (name === ".*") {
        return { kind: "hidden", pattern: line, matcher: globToRegExp("*/.*") };
    }
    return { kind: "name", pattern: line, matcher: globToRegExp(name) };
}

/**
 * Translates a whole .gitignore; the .git/ exclusion always comes first
 */
export function parseGitignore(text: string): Exclusion[] {
    const exclusions = [GIT_DIR_EXCLUSION];
    for (const line of text.split(/\r?\n/)) {
        const exclusion = translateGitignoreLine(line);
        if (exclusion) {
            exclusions.push(exclusion);
        }
    }
    return exclusions;
}

/**
 * Gives a bare relative path the `./` prefix find(1) prints for it
 */
export function findStylePath(filePath: string): string {
    if (filePath.startsWith("/") || filePath.startsWith("./") || filePath.startsWith("../")) {
        return filePath;
    }
    return `./${filePath}`;
}

/**
 * Returns true when a file path (as listed, e.g. `./src/a.ts`) is excluded
 */
export function isExcluded(filePath: string, exclusions: Exclusion[]): boolean {
    const path = findStylePath(filePath);
    const name = basename(path);
    return exclusions.some((exclusion) =>
        exclusion.kind === "name" ? exclusion.matcher.test(name) : exclusion.matcher.test(path)
    );
}
