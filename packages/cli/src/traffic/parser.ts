/**
 * Traefik log line parsing
 *
 * Pulls the client address, error class, request path, router host and a
 * suspicious-request flag out of one line of `docker logs traefik`.
 */

import { isPrivateAddress } from "./ip.js";

export const UNKNOWN = "Unknown";

/**
 * Request fragments typical of scanners and injection attempts
 */
export const SUSPICIOUS_PATTERNS: RegExp[] = [
    /wp-login\.php/i,
    /wp-admin/i,
    /\.git/i,
    /\.env/i,
    /\/admin/i,
    /\/phpMyAdmin/i,
    /\/phpmyadmin/i,
    /\/solr/i,
    /\/jenkins/i,
    /select.*from/i,
    /union.*select/i,
    /eval\(/i,
    /exec\(/i,
    /["'].*<script/i,
];

/**
 * Substring checks mapped to error classes, first match wins
 */
const ERROR_CLASSES: Array<[string, string]> = [
    ["read: connection timed out", "Connection Timeout"],
    ["read: connection reset by peer", "Connection Reset"],
    ["write: broken pipe", "Broken Pipe"],
    ["Could not retrieve CanonizedHost, rejecting", "Host Rejected"],
    ["TLS handshake error", "TLS Handshake Error"],
];

/**
 * Startup noise that carries no client information
 */
const IGNORED_MARKERS = ['level=info msg="Starting provider', "Configuration loaded"];

/**
 * Client address fallbacks when there is no `tcp a->b` pair
 */
const ADDRESS_PATTERNS: RegExp[] = [
    /(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}):/,
    /(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}) -/,
    /client=(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})/,
    /rejecting "([^"]+)"/,
];

const RAW_LOG_LENGTH = 150;

export interface ClientEndpoint {
    ip: string;
    remotePort: string;
    /** Port on the proxy side of the connection */
    localPort: string;
}

export interface LogEntry extends ClientEndpoint {
    timestamp: string;
    errorType: string;
    path: string;
    host: string;
    suspicious: boolean;
    /** Leading part of the line */
    rawLog: string;
}

/**
 * Finds the client endpoint in a line
 */
export function extractClientEndpoint(line: string): ClientEndpoint | null {
    const pair = /tcp ([\d.:]+)->([^:]+):(\d+)/.exec(line);
    if (pair) {
        const [, localEndpoint = "", ip = "", remotePort = ""] = pair;
        const localPort = /:(\d+)$/.exec(localEndpoint)?.[1] ?? UNKNOWN;
        return { ip, remotePort, localPort };
    }

    for (const pattern of ADDRESS_PATTERNS) {
        const match = pattern.exec(line);
        if (match?.[1]) {
            return { ip: match[1], remotePort: UNKNOWN, localPort: UNKNOWN };
        }
    }
    return null;
}

/**
 * Classifies the error a line reports
 */
export function classifyError(line: string): string {
    for (const [marker, errorType] of ERROR_CLASSES) {
        if (line.includes(marker)) {
            return errorType;
        }
    }
    if (line.includes("level=error")) {
        return /msg="([^"]+)"/.exec(line)?.[1] ?? UNKNOWN;
    }
    return UNKNOWN;
}

/**
 * Returns true when any suspicious pattern matches
 */
export function isSuspicious(line: string): boolean {
    return SUSPICIOUS_PATTERNS.some((pattern) => pattern.test(line));
}

/**
 * Returns true for lines skipped before parsing
 */
export function isIgnoredLine(line: string): boolean {
    return IGNORED_MARKERS.some((marker) => line.includes(marker));
}

/**
 * Parses one line. Returns null when no client address is found or the
 * client is on a private network.
 */
export function parseLogLine(line: string): LogEntry | null {
    const endpoint = extractClientEndpoint(line);
    if (!endpoint || isPrivateAddress(endpoint.ip)) {
        return null;
    }

    const timestamp = /time="([^"]+)"/.exec(line)?.[1] ?? UNKNOWN;
    const path = /"(GET|POST|PUT|DELETE) ([^"]+)"/.exec(line)?.[2] ?? UNKNOWN;
    const host = /Host\(`([^`]+)`\)/.exec(line)?.[1] ?? /Host: ([^\s,]+)/.exec(line)?.[1] ?? UNKNOWN;

    return {
        ...endpoint,
        timestamp,
        errorType: classifyError(line),
        path,
        host,
        suspicious: isSuspicious(line),
        rawLog: line.slice(0, RAW_LOG_LENGTH),
    };
}
