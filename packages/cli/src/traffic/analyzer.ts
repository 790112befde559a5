/**
 * Traffic analysis
 *
 * Accumulates parsed log entries into per-IP, per-country and per-error
 * counters. Countries are resolved once per new IP.
 */

import { run } from "../lib/exec.js";
import { isIgnoredLine, parseLogLine, UNKNOWN, type LogEntry } from "./parser.js";

export type CountryResolver = (ip: string) => Promise<string>;

export interface SuspiciousEvent {
    timestamp: string;
    errorType: string;
    endpoint: string;
    localPort: string;
    rawLog: string;
}

export interface IpDetails {
    country: string;
    ports: Set<string>;
    endpoints: Set<string>;
}

/**
 * Plain-data form of an analysis, used for --json
 */
export interface TrafficSummary {
    totalConnections: number;
    unknownHosts: number;
    connectionErrors: number;
    ips: Array<{ ip: string; count: number; country: string; ports: string[]; endpoints: string[] }>;
    countries: Array<{ country: string; count: number }>;
    errorTypes: Array<{ errorType: string; count: number }>;
    suspicious: Array<{ ip: string; country: string; events: SuspiciousEvent[] }>;
}

/**
 * Looks up a country with geoiplookup; Unknown when it fails
 */
export async function geoipCountry(ip: string): Promise<string> {
    const result = await run("geoiplookup", [ip], { check: false });
    const match = /GeoIP Country Edition: ([^,]+)/.exec(result.stdout);
    return match?.[1]?.trim() || UNKNOWN;
}

/**
 * Counts in descending order, ties kept in first-seen order
 */
export function mostCommon(counts: Map<string, number>, limit?: number): Array<[string, number]> {
    const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1]);
    return limit === undefined ? sorted : sorted.slice(0, limit);
}

function increment(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

export class TrafficAnalyzer {
    readonly ips = new Map<string, number>();
    readonly countries = new Map<string, number>();
    readonly errorTypes = new Map<string, number>();
    readonly suspicious = new Map<string, SuspiciousEvent[]>();
    readonly details = new Map<string, IpDetails>();
    totalConnections = 0;
    unknownHosts = 0;
    connectionErrors = 0;

    constructor(private readonly resolveCountry: CountryResolver = geoipCountry) {}

    /**
     * Parses and records every usable line; returns how many were recorded
     */
    async analyzeLines(lines: string[]): Promise<number> {
        let processed = 0;
        for (const line of lines) {
            if (isIgnoredLine(line)) {
                continue;
            }
            const entry = parseLogLine(line);
            if (entry) {
                await this.record(entry);
                processed++;
            }
        }
        this.totalConnections += processed;
        return processed;
    }

    /**
     * Adds one parsed entry to the counters
     */
    async record(entry: LogEntry): Promise<void> {
        increment(this.ips, entry.ip);

        let details = this.details.get(entry.ip);
        if (!details) {
            const country = await this.resolveCountry(entry.ip);
            details = { country, ports: new Set(), endpoints: new Set() };
            this.details.set(entry.ip, details);
            increment(this.countries, country);
        }

        details.ports.add(entry.localPort);
        const endpoint = entry.path !== UNKNOWN ? `${entry.host}${entry.path}` : UNKNOWN;
        details.endpoints.add(endpoint);

        if (entry.errorType !== UNKNOWN) {
            increment(this.errorTypes, entry.errorType);
        }
        if (entry.errorType === "Host Rejected") {
            this.unknownHosts++;
        } else if (entry.errorType.includes("Connection") || entry.errorType.includes("Error")) {
            this.connectionErrors++;
        }

        if (entry.suspicious) {
            const events = this.suspicious.get(entry.ip) ?? [];
            events.push({
                timestamp: entry.timestamp,
                errorType: entry.errorType,
                endpoint,
                localPort: entry.localPort,
                rawLog: entry.rawLog,
            });
            this.suspicious.set(entry.ip, events);
        }
    }

    /**
     * Country recorded for an IP
     */
    countryOf(ip: string): string {
        return this.details.get(ip)?.country ?? UNKNOWN;
    }

    toSummary(): TrafficSummary {
        return {
            totalConnections: this.totalConnections,
            unknownHosts: this.unknownHosts,
            connectionErrors: this.connectionErrors,
            ips: mostCommon(this.ips).map(([ip, count]) => ({
                ip,
                count,
                country: this.countryOf(ip),
                ports: [...(this.details.get(ip)?.ports ?? [])].sort(),
                endpoints: [...(this.details.get(ip)?.endpoints ?? [])].sort(),
            })),
            countries: mostCommon(this.countries).map(([country, count]) => ({ country, count })),
            errorTypes: mostCommon(this.errorTypes).map(([errorType, count]) => ({ errorType, count })),
            suspicious: [...this.suspicious.entries()].map(([ip, events]) => ({
                ip,
                country: this.countryOf(ip),
                events,
            })),
        };
    }
}
