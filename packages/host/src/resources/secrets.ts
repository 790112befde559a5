/**
 * Secrets directory resource
 *
 * /etc/secrets holds the env files read by the CLI and the compose stack.
 * Everything in it belongs to root:secrets; the admin user joins the
 * secrets group so it can read them without sudo.
 */

import type * as pulumi from "@pulumi/pulumi";
import { SECRET_PATHS, SECRETS_GROUP } from "@hostkit/shared";
import { runCommand } from "../lib/command.js";

export interface SetupSecretsDirOptions {
    /** Admin username to add to the secrets group */
    username: string;
    /** Resources to depend on */
    dependsOn?: pulumi.Resource[];
}

export interface SetupSecretsDirResult {
    /** The command resource that secured the directory */
    resource: pulumi.Resource;
    /** Secrets directory path */
    path: string;
}

/**
 * Generates the shell script that creates the group and fixes permissions
 */
export function generateSecretsDirScript(username: string): string {
    const dir = SECRET_PATHS.dir;
    return `
getent group ${SECRETS_GROUP} >/dev/null || groupadd ${SECRETS_GROUP}
mkdir -p ${dir}
chown root:${SECRETS_GROUP} ${dir}
chmod 750 ${dir}
find ${dir} -mindepth 1 -type f -exec chown root:${SECRETS_GROUP} {} + -exec chmod 640 {} +
find ${dir} -mindepth 1 -type d -exec chown root:${SECRETS_GROUP} {} + -exec chmod 750 {} +
usermod -aG ${SECRETS_GROUP} ${username}
echo "Secured ${dir} (root:${SECRETS_GROUP}, dirs 750, files 640)"
`.trim();
}

/**
 * Creates the secrets group and directory with the expected permissions
 */
export function setupSecretsDir(options: SetupSecretsDirOptions): SetupSecretsDirResult {
    const { username, dependsOn = [] } = options;

    const resource = runCommand({
        name: "secrets-dir",
        create: generateSecretsDirScript(username),
        dependsOn,
    });

    return { resource, path: SECRET_PATHS.dir };
}
