/**
 * Package installation service types
 */

import type * as pulumi from "@pulumi/pulumi";
import type { OptionalPackage } from "@hostkit/shared";

/**
 * Options for setting up packages
 */
export interface SetupPackagesOptions {
    /** Admin user (NVM is installed for this user and root) */
    adminUser: string;
    /** Optional catalogue items to install */
    packages?: OptionalPackage[];
    /** Resources to depend on */
    dependsOn?: pulumi.Resource[];
}

/**
 * Result from setting up packages
 */
export interface SetupPackagesResult {
    /** The Pulumi resources created, in installation order */
    resources: pulumi.Resource[];
    /** The critical package installation, for early dependents */
    critical: pulumi.Resource;
    /** Set when Docker was installed */
    docker?: pulumi.Resource;
}

/**
 * Catalogue item installed from apt repositories
 */
export interface AptRecipe {
    kind: "apt";
    /** apt package names */
    packages: string[];
}

/**
 * Catalogue item installed by its own script
 */
export interface ScriptRecipe {
    kind: "script";
    /** Generates the install script for the admin user */
    script: (adminUser: string) => string;
}

export type PackageRecipe = AptRecipe | ScriptRecipe;
