/**
 * DNS service types
 */

import type * as pulumi from "@pulumi/pulumi";
import type * as cloudflare from "@pulumi/cloudflare";
import type { DnsConfig } from "@hostkit/shared";

/**
 * Options for setting up DNS records
 */
export interface SetupDnsOptions extends DnsConfig {
    /** Resources to depend on */
    dependsOn?: pulumi.Resource[];
}

/**
 * Result from setting up DNS records
 */
export interface SetupDnsResult {
    /** Every Pulumi resource created */
    resources: pulumi.Resource[];
    /** The CNAME records, keyed by subdomain */
    records: Record<string, cloudflare.Record>;
    /** Fully qualified names of the records */
    hostnames: string[];
}

/**
 * Timing of the propagation check
 */
export interface PropagationCheckOptions {
    /** Seconds to wait before the first lookup (default: 30) */
    initialWait?: number;
    /** Lookups per hostname (default: 20) */
    attempts?: number;
    /** Seconds between lookups (default: 10) */
    interval?: number;
    /** Seconds to wait after every record resolved (default: 60) */
    settleWait?: number;
}
