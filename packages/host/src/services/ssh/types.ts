/**
 * SSH service types
 */

import type * as pulumi from "@pulumi/pulumi";
import type { SSHConfig } from "@hostkit/shared";

/**
 * Options for setting up SSH
 */
export interface SetupSSHOptions extends SSHConfig {
    /** Admin user whose keys are deployed */
    adminUser: string;
    /** Resources to depend on (should include packages and user setup) */
    dependsOn?: pulumi.Resource[];
}

/**
 * Result from setting up SSH
 */
export interface SetupSSHResult {
    /** The Pulumi resources created */
    resources: pulumi.Resource[];
}

/**
 * Inputs to sshd_config generation
 */
export interface SSHDConfigOptions {
    adminUser: string;
    lanCidr: string;
    port: number;
    permitRootLogin: boolean;
}
