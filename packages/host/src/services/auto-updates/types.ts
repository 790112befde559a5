/**
 * Auto-updates service types
 */

import type * as pulumi from "@pulumi/pulumi";

/**
 * Options for setting up auto-updates
 */
export interface SetupAutoUpdatesOptions {
    /** Automatic reboot if required (default: false) */
    autoReboot?: boolean;
    /** Reboot time when auto-reboot is on (default: 02:00) */
    rebootTime?: string;
    /** Resources to depend on (should include packages service) */
    dependsOn?: pulumi.Resource[];
}

/**
 * Result from setting up auto-updates
 */
export interface SetupAutoUpdatesResult {
    /** The Pulumi resources created */
    resources: pulumi.Resource[];
}
