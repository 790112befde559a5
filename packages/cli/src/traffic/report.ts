/**
 * Traffic report rendering
 */

import { formatTimestamp } from "@hostkit/shared";
import { mostCommon, type TrafficAnalyzer } from "./analyzer.js";
import { UNKNOWN } from "./parser.js";

const RULE = "=".repeat(80);
const DIVIDER = "-".repeat(80);
const SAMPLE_EVENTS = 5;

/**
 * Renders the human-readable report as lines
 */
export function renderReport(analyzer: TrafficAnalyzer, now: Date = new Date()): string[] {
    const lines: string[] = ["", RULE, `WEB TRAFFIC ANALYSIS REPORT - ${formatTimestamp(now)}`, RULE, ""];

    if (analyzer.totalConnections === 0) {
        lines.push(
            "No connection attempts found to analyze.",
            "",
            "Possible reasons:",
            "1. Your Traefik container might be new with few connections",
            "2. Log format might not match what the parser expects"
        );
        return lines;
    }

    lines.push(
        `Total connection attempts analyzed: ${analyzer.totalConnections}`,
        `Rejected unknown hosts: ${analyzer.unknownHosts}`,
        `Connection errors/timeouts: ${analyzer.connectionErrors}`,
        ""
    );

    if (analyzer.suspicious.size > 0) {
        lines.push("", "SUSPICIOUS ACTIVITY DETECTED:", DIVIDER);
        for (const [ip, events] of analyzer.suspicious) {
            lines.push("", `IP: ${ip} (${analyzer.countryOf(ip)})`);
            lines.push(`Total suspicious events: ${events.length}`, "Sample events:");
            events.slice(0, SAMPLE_EVENTS).forEach((event, index) => {
                lines.push(
                    `  ${index + 1}. [${event.timestamp}] ${event.errorType} - Port: ${event.localPort}`,
                    `     Endpoint: ${event.endpoint}`,
                    `     ${event.rawLog}`
                );
            });
            if (events.length > SAMPLE_EVENTS) {
                lines.push(`  ... and ${events.length - SAMPLE_EVENTS} more`);
            }
        }
        lines.push(DIVIDER);
    }

    lines.push("", "TOP 10 CONNECTING IP ADDRESSES:", DIVIDER);
    for (const [ip, count] of mostCommon(analyzer.ips, 10)) {
        const details = analyzer.details.get(ip);
        const ports = [...(details?.ports ?? [])].sort().join(", ");
        lines.push(`${ip} (${analyzer.countryOf(ip)}):`);
        lines.push(`  Connection attempts: ${count}`, `  Ports accessed: ${ports}`);
        const endpoints = [...(details?.endpoints ?? [])];
        if (endpoints.length > 0 && !(endpoints.length === 1 && endpoints[0] === UNKNOWN)) {
            lines.push(`  Endpoints: ${endpoints.sort().join(", ")}`);
        }
        lines.push("");
    }

    lines.push("", "TOP 5 COUNTRIES:", DIVIDER);
    for (const [country, count] of mostCommon(analyzer.countries, 5)) {
        lines.push(`${country}: ${count} connection attempts`);
    }

    lines.push("", "ERROR TYPES DISTRIBUTION:", DIVIDER);
    for (const [errorType, count] of mostCommon(analyzer.errorTypes)) {
        lines.push(`${errorType}: ${count} occurrences`);
    }

    lines.push("", RULE, "END OF REPORT", RULE, "");
    return lines;
}
