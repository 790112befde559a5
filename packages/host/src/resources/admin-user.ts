/**
 * Admin user resource
 *
 * Grants the non-root administrator sudo rights through a validated
 * /etc/sudoers.d drop-in and, once Docker is installed, access to the
 * docker socket.
 */

import type * as pulumi from "@pulumi/pulumi";
import { runCommand } from "../lib/command.js";

export interface SetupAdminUserOptions {
    /** Admin username (must already exist) */
    username: string;
    /** Resources to depend on (should include critical packages) */
    dependsOn?: pulumi.Resource[];
}

export interface SetupAdminUserResult {
    /** The Pulumi resources created */
    resources: pulumi.Resource[];
    /** The username */
    username: string;
    /** Resolved home directory (shell expression) */
    homeDir: string;
}

/**
 * Generates the /etc/sudoers.d entry for a user
 */
export function generateSudoersEntry(username: string): string {
    return `${username} ALL=(ALL) ALL`;
}

/**
 * Returns a shell expression resolving the user's home directory
 */
export function homeDirExpression(username: string): string {
    return `$(getent passwd ${username} | cut -d: -f6)`;
}

/**
 * Generates a POSIX sh script that fails unless the user exists
 */
export function generateUserCheckScript(username: string): string {
    return [
        `if ! id "${username}" >/dev/null 2>&1; then`,
        `    echo "User ${username} does not exist. Create it first (adduser ${username})." >&2`,
        "    exit 1",
        "fi",
        `echo "User ${username} exists"`,
    ].join("\n");
}

/**
 * Ensures the admin user exists and can use sudo
 */
export function setupAdminUser(options: SetupAdminUserOptions): SetupAdminUserResult {
    const { username, dependsOn = [] } = options;
    const resources: pulumi.Resource[] = [];
    const sudoersPath = `/etc/sudoers.d/${username}`;

    const checkUser = runCommand({
        name: `admin-user-check-${username}`,
        create: generateUserCheckScript(username),
        dependsOn,
    });
    resources.push(checkUser);

    // Written to a temp file and checked with visudo so a bad entry never locks out sudo
    const sudoers = runCommand({
        name: `admin-user-sudoers-${username}`,
        create: `
            set -e
            tmp=$(mktemp)
            echo '${generateSudoersEntry(username)}' > "$tmp"
            visudo -cf "$tmp"
            install -m 0440 -o root -g root "$tmp" ${sudoersPath}
            rm -f "$tmp"
            usermod -aG sudo ${username}
            echo "Granted sudo to ${username}"
        `.trim(),
        delete: `rm -f ${sudoersPath}`,
        dependsOn: [checkUser],
    });
    resources.push(sudoers);

    return { resources, username, homeDir: homeDirExpression(username) };
}

export interface AddDockerGroupOptions {
    /** Admin username */
    username: string;
    /** Resources to depend on (should include the docker installation) */
    dependsOn?: pulumi.Resource[];
}

/**
 * Adds the user to the docker group when the group exists
 */
export function addUserToDockerGroup(options: AddDockerGroupOptions): pulumi.Resource {
    const { username, dependsOn = [] } = options;

    return runCommand({
        name: `admin-user-docker-group-${username}`,
        create: `
            if getent group docker >/dev/null; then
                usermod -aG docker ${username}
                echo "Added ${username} to docker group"
            else
                echo "docker group not present, skipping"
            fi
        `.trim(),
        dependsOn,
    });
}
