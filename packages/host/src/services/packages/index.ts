/**
 * Package installation service
 *
 * Installs critical packages first, then every selected apt package in a
 * single operation, then the script-installed items one after another so
 * they never contend for the apt lock.
 */

import type * as pulumi from "@pulumi/pulumi";
import { runCommand } from "../../lib/command.js";
import {
    CRITICAL_APT_PACKAGES,
    PACKAGE_CATALOG,
    collectAptPackages,
    generateDockerRepoScript,
    isInstalledCheck,
} from "./catalog.js";
import type { SetupPackagesOptions, SetupPackagesResult } from "./types.js";

export type { SetupPackagesOptions, SetupPackagesResult, PackageRecipe } from "./types.js";
export * from "./catalog.js";

/**
 * Generates an apt-get install script for a package list
 */
export function generateAptInstallScript(packages: string[]): string {
    const packageList = packages.join(" ");
    return `
export DEBIAN_FRONTEND=noninteractive
apt-get update
apt-get install -y ${packageList}
echo "Installed packages: ${packageList}"
`.trim();
}

/**
 * Generates the script that reports which selected items are present
 */
export function generateVerifyScript(aptPackages: string[], scripted: string[]): string {
    const lines = ['echo "Verifying package installation..."'];
    for (const pkg of aptPackages) {
        lines.push(`${isInstalledCheck(pkg)} && echo "${pkg}: OK" || echo "${pkg}: MISSING"`);
    }
    for (const id of scripted) {
        lines.push(`echo "${id}: installed by script"`);
    }
    return lines.join("\n");
}

/**
 * Sets up critical packages and the selected optional packages
 */
export function setupPackages(options: SetupPackagesOptions): SetupPackagesResult {
    const { adminUser, packages = [], dependsOn = [] } = options;
    const resources: pulumi.Resource[] = [];

    const critical = runCommand({
        name: "install-critical-packages",
        create: generateAptInstallScript(CRITICAL_APT_PACKAGES),
        dependsOn,
    });
    resources.push(critical);
    let previous: pulumi.Resource = critical;

    const wantsDocker = packages.includes("docker");
    if (wantsDocker) {
        previous = runCommand({
            name: "docker-apt-repository",
            create: generateDockerRepoScript(),
            delete: "rm -f /etc/apt/sources.list.d/docker.list",
            dependsOn: [previous],
        });
        resources.push(previous);
    }

    const aptPackages = collectAptPackages(packages);
    let docker: pulumi.Resource | undefined;
    if (aptPackages.length > 0) {
        previous = runCommand({
            name: "install-apt-packages",
            create: generateAptInstallScript(aptPackages),
            dependsOn: [previous],
        });
        resources.push(previous);
        if (wantsDocker) {
            docker = previous;
        }
    }

    const scripted: string[] = [];
    for (const id of packages) {
        const recipe = PACKAGE_CATALOG[id];
        if (recipe.kind !== "script") {
            continue;
        }
        previous = runCommand({
            name: `install-${id}`,
            create: recipe.script(adminUser),
            dependsOn: [previous],
        });
        resources.push(previous);
        scripted.push(id);
    }

    const verify = runCommand({
        name: "verify-packages",
        create: generateVerifyScript([...CRITICAL_APT_PACKAGES, ...aptPackages], scripted),
        dependsOn: [previous],
    });
    resources.push(verify);

    return { resources, critical, docker };
}
