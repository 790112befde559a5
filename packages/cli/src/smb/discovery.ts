/**
 * SMB share discovery
 *
 * Finds file servers on the LAN with an nmap port scan, then lists their
 * shares with smbclient. Older NAS firmware only speaks early dialects, so
 * each host is tried with SMB3, then SMB2, then NT1 until one answers.
 */

import { run } from "../lib/exec.js";
import { getLogger } from "../lib/log.js";

/**
 * Dialects tried in order
 */
export const SMB_PROTOCOLS = ["SMB3", "SMB2", "NT1"] as const;

export type SmbProtocol = (typeof SMB_PROTOCOLS)[number];

export interface SmbServer {
    address: string;
    /** Reverse DNS name reported by nmap */
    hostname?: string;
}

export interface SmbShare {
    name: string;
    comment: string;
}

export interface SmbCredentials {
    user: string;
    password: string;
}

export interface ShareListing {
    host: string;
    /** Dialect that answered, null when none did */
    protocol: SmbProtocol | null;
    shares: SmbShare[];
    /** One message per failed dialect */
    errors: string[];
}

const NMAP_HOST_LINE = /^Host:\s+(\S+)\s+\(([^)]*)\)\s+Ports:\s+(.*)$/;

/**
 * Parses `nmap -oG -` output into hosts with port 445 open
 */
export function parseNmapGrepable(output: string): SmbServer[] {
    const servers: SmbServer[] = [];
    for (const line of output.split("\n")) {
        const match = NMAP_HOST_LINE.exec(line.trim());
        if (!match) {
            continue;
        }
        const [, address = "", hostname = "", ports = ""] = match;
        if (!/\b445\/open\b/.test(ports)) {
            continue;
        }
        servers.push(hostname ? { address, hostname } : { address });
    }
    return servers;
}

/**
 * Parses `smbclient -L -g` output into disk shares, without
 * administrative ($) shares
 */
export function parseShareList(output: string): SmbShare[] {
    const shares: SmbShare[] = [];
    for (const line of output.split("\n")) {
        const [type, name, ...comment] = line.trim().split("|");
        if (type !== "Disk" || !name || name.endsWith("$")) {
            continue;
        }
        shares.push({ name, comment: comment.join("|") });
    }
    return shares;
}

/**
 * Scans a subnet for hosts with SMB (445/tcp) open
 */
export async function scanSubnet(cidr: string): Promise<SmbServer[]> {
    const result = await run("nmap", ["-p", "445", "--open", "-oG", "-", cidr]);
    if (result.exitCode !== 0) {
        const reason = result.stderr.trim() || `exit code ${result.exitCode}`;
        throw new Error(`nmap scan of ${cidr} failed: ${reason}`);
    }
    return parseNmapGrepable(result.stdout);
}

/**
 * Lists a host's shares, trying each dialect in turn
 */
export async function listShares(host: string, credentials?: SmbCredentials): Promise<ShareListing> {
    const logger = getLogger();
    const auth = credentials ? ["-U", `${credentials.user}%${credentials.password}`] : ["-N"];
    const errors: string[] = [];

    for (const protocol of SMB_PROTOCOLS) {
        const result = await run("smbclient", ["-L", `//${host}`, "-g", "-m", protocol, ...auth], {
            check: false,
        });
        const output = `${result.stdout}\n${result.stderr}`;
        const status = /NT_STATUS_\w+/.exec(output);

        if (result.exitCode === 0 && !status) {
            logger.debug(`${host} answered with ${protocol}`);
            return { host, protocol, shares: parseShareList(result.stdout), errors };
        }

        errors.push(`${protocol}: ${status ? status[0] : `exit code ${result.exitCode}`}`);
        logger.debug(`${host} did not answer with ${protocol}`);
    }

    return { host, protocol: null, shares: [], errors };
}

export interface DiscoverSharesOptions {
    /** Subnet to scan when no hosts are given */
    subnet?: string;
    /** Hosts to query directly */
    hosts?: string[];
    credentials?: SmbCredentials;
}

/**
 * Scans for servers (or takes the given hosts) and lists every server's shares
 */
export async function discoverShares(options: DiscoverSharesOptions): Promise<ShareListing[]> {
    const { subnet, hosts = [], credentials } = options;

    let targets = hosts;
    if (targets.length === 0) {
        if (!subnet) {
            throw new Error("Either a subnet or at least one host is required");
        }
        targets = (await scanSubnet(subnet)).map((server) => server.hostname ?? server.address);
    }

    const listings: ShareListing[] = [];
    for (const target of targets) {
        listings.push(await listShares(target, credentials));
    }
    return listings;
}
