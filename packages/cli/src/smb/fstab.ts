/**
 * /etc/fstab entries for CIFS shares
 */

export type FstabChange = "added" | "updated" | "unchanged";

export interface FstabEntryOptions {
    host: string;
    share: string;
    mountPoint: string;
    credentialsFile: string;
    /** Owner of the mounted files */
    user: string;
}

/**
 * Credentials file for a server: /etc/.smb_<host with dots as underscores>
 */
export function credentialsPathFor(host: string, dir = "/etc"): string {
    return `${dir}/.smb_${host.replaceAll(".", "_")}`;
}

/**
 * Mount point for a share
 */
export function mountPointFor(share: string): string {
    return `/mnt/${share}`;
}

/**
 * Builds the fstab line for a share
 */
export function buildFstabEntry(options: FstabEntryOptions): string {
    const { host, share, mountPoint, credentialsFile, user } = options;
    const mountOptions = [
        `credentials=${credentialsFile}`,
        "iocharset=utf8",
        "file_mode=0777",
        "dir_mode=0777",
        "x-gvfs-show",
        `uid=${user}`,
        `gid=${user}`,
    ].join(",");
    return `//${host}/${share} ${mountPoint} cifs ${mountOptions} 0 0`;
}

/**
 * Key identifying a share's fstab line: source and mount point
 */
export function fstabKey(host: string, share: string, mountPoint: string): string {
    return `//${host}/${share} ${mountPoint}`;
}

/**
 * Adds or replaces the line for a share.
 * Every line containing the key is replaced; the content is untouched when
 * the exact entry is already present.
 */
export function upsertFstabEntry(
    content: string,
    entry: string,
    key: string
): { content: string; change: FstabChange } {
    const lines = content.split("\n");

    if (lines.includes(entry)) {
        return { content, change: "unchanged" };
    }

    if (lines.some((line) => line.includes(key))) {
        const updated = lines.map((line) => (line.includes(key) ? entry : line));
        return { content: updated.join("\n"), change: "updated" };
    }

    const separator = content.length === 0 || content.endsWith("\n") ? "" : "\n";
    return { content: `${content}${separator}${entry}\n`, change: "added" };
}
