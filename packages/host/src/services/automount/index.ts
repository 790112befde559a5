/**
 * Network automount service
 *
 * CIFS and NFS entries in /etc/fstab often fail at boot because the file
 * servers answer later than network-online.target. This oneshot unit waits
 * for every fstab network host to answer a ping, then runs `mount -a`.
 */

import type * as pulumi from "@pulumi/pulumi";
import { writeFile, enableService } from "../../lib/command.js";

export const AUTOMOUNT_SERVICE = "automount-on-start";
export const AUTOMOUNT_UNIT_PATH = `/etc/systemd/system/${AUTOMOUNT_SERVICE}.service`;

export interface SetupAutomountOptions {
    /** Seconds to wait before probing hosts (default: 15) */
    initialDelay?: number;
    /** Ping attempts per host (default: 10) */
    attempts?: number;
    /** Seconds between ping attempts (default: 3) */
    retryDelay?: number;
    /** Resources to depend on */
    dependsOn?: pulumi.Resource[];
}

export interface SetupAutomountResult {
    /** The Pulumi resources created */
    resources: pulumi.Resource[];
}

/**
 * Generates the systemd unit
 */
export function generateAutomountUnit(
    options: Pick<SetupAutomountOptions, "initialDelay" | "attempts" | "retryDelay"> = {}
): string {
    const { initialDelay = 15, attempts = 10, retryDelay = 3 } = options;

    // systemd expands $VAR in ExecStart, so shell variables are written as $$
    const script =
        `hosts=$$(grep -E "^[^#].*(cifs|nfs)" /etc/fstab | grep -oP "//\\\\K[^/]+" | sort -u); ` +
        `for host in $$hosts; do for i in $$(seq 1 ${attempts}); do ` +
        `ping -c 1 -W 2 $$host >/dev/null && break || (echo "Waiting for $$host..." && sleep ${retryDelay}); ` +
        `done; done; mount -a`;

    return `
[Unit]
Description=Dynamically check network mounts and automount on start
After=network-online.target
Wants=network-online.target

[Service]
Type=oneshot
ExecStartPre=/bin/sleep ${initialDelay}
ExecStart=/bin/bash -c '${script}'
RemainAfterExit=yes

[Install]
WantedBy=multi-user.target
`.trim();
}

/**
 * Installs and enables the automount unit
 */
export function setupAutomount(options: SetupAutomountOptions = {}): SetupAutomountResult {
    const { dependsOn = [], ...unitOptions } = options;
    const resources: pulumi.Resource[] = [];

    const unit = writeFile({
        name: "automount-unit",
        path: AUTOMOUNT_UNIT_PATH,
        content: generateAutomountUnit(unitOptions),
        mode: "644",
        dependsOn,
    });
    resources.push(unit);

    const enable = enableService({
        name: "enable-automount",
        service: AUTOMOUNT_SERVICE,
        dependsOn: [unit],
    });
    resources.push(enable);

    return { resources };
}
