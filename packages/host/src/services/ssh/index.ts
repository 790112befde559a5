/**
 * SSH Hardening Service
 *
 * Configures the SSH daemon for key-only access from the LAN:
 * - Disables password authentication (key-only)
 * - Allows only the admin user and, from the LAN, root
 * - Denies every user outside the LAN range
 * - Deploys authorized SSH keys and a keypair for the admin user
 *
 * The main sshd_config is replaced (after a one-time backup) so the
 * Match blocks come after every global setting.
 */

import type * as pulumi from "@pulumi/pulumi";
import { runCommand, writeFile } from "../../lib/command.js";
import { homeDirExpression } from "../../resources/admin-user.js";
import type { SetupSSHOptions, SetupSSHResult, SSHDConfigOptions } from "./types.js";

export type { SetupSSHOptions, SetupSSHResult, SSHDConfigOptions } from "./types.js";

export const SSHD_CONFIG_PATH = "/etc/ssh/sshd_config";

/**
 * Fixed daemon settings
 */
const SSHD_SETTINGS = {
    protocol: 2,
    passwordAuthentication: "no",
    pubkeyAuthentication: "yes",
    maxAuthTries: 3,
    loginGraceTime: 30,
    x11Forwarding: "no",
    clientAliveInterval: 300,
    clientAliveCountMax: 2,
} as const;

/**
 * Generates the complete /etc/ssh/sshd_config
 */
export function generateSSHDConfig(options: SSHDConfigOptions): string {
    const { adminUser, lanCidr, port, permitRootLogin } = options;
    const rootLogin = permitRootLogin ? "yes" : "no";
    const allowUsers = permitRootLogin ? `${adminUser} root` : adminUser;

    const lines = [
        "# Managed by hostkit - Do not edit manually",
        "# Original configuration saved as sshd_config.bak",
        "",
        "Include /etc/ssh/sshd_config.d/*.conf",
        "",
        `Port ${port}`,
        `Protocol ${SSHD_SETTINGS.protocol}`,
        `PermitRootLogin ${rootLogin}`,
        `PasswordAuthentication ${SSHD_SETTINGS.passwordAuthentication}`,
        `PubkeyAuthentication ${SSHD_SETTINGS.pubkeyAuthentication}`,
        `MaxAuthTries ${SSHD_SETTINGS.maxAuthTries}`,
        `LoginGraceTime ${SSHD_SETTINGS.loginGraceTime}`,
        `X11Forwarding ${SSHD_SETTINGS.x11Forwarding}`,
        `ClientAliveInterval ${SSHD_SETTINGS.clientAliveInterval}`,
        `ClientAliveCountMax ${SSHD_SETTINGS.clientAliveCountMax}`,
        `AllowUsers ${allowUsers}`,
        "",
        "# LAN access",
        `Match Address ${lanCidr}`,
        `    PermitRootLogin ${rootLogin}`,
        "    PubkeyAuthentication yes",
        "",
        "# Everything else",
        `Match Address *,!${lanCidr}`,
        "    DenyUsers *",
        "",
    ];
    return lines.join("\n");
}

/**
 * Generates the authorized_keys file content
 */
export function generateAuthorizedKeys(keys: string[]): string {
    const uniqueKeys = [...new Set(keys.map((key) => key.trim()).filter((key) => key.length > 0))];
    const lines = ["# Authorized SSH keys", "# Managed by hostkit - Do not edit manually", "", ...uniqueKeys, ""];
    return lines.join("\n");
}

/**
 * Sets up SSH hardening
 * - Backs up and replaces sshd_config
 * - Deploys authorized_keys and an id_rsa keypair for the admin user
 * - Validates and restarts sshd
 */
export function setupSSH(options: SetupSSHOptions): SetupSSHResult {
    const { adminUser, authorizedKeys, lanCidr, port, permitRootLogin, dependsOn = [] } = options;
    const resources: pulumi.Resource[] = [];

    if (authorizedKeys.length === 0) {
        throw new Error(
            "SSH hardening requires at least one authorized key. " +
                "Add keys to hostkit:ssh-authorized-keys in Pulumi config."
        );
    }

    const home = homeDirExpression(adminUser);

    const backup = runCommand({
        name: "sshd-config-backup",
        create: `
            if [ -f ${SSHD_CONFIG_PATH} ] && [ ! -f ${SSHD_CONFIG_PATH}.bak ]; then
                cp ${SSHD_CONFIG_PATH} ${SSHD_CONFIG_PATH}.bak
                echo "Backed up ${SSHD_CONFIG_PATH}"
            fi
        `.trim(),
        dependsOn,
    });
    resources.push(backup);

    const sshdConfig = writeFile({
        name: "sshd-config",
        path: SSHD_CONFIG_PATH,
        content: generateSSHDConfig({ adminUser, lanCidr, port, permitRootLogin }),
        mode: "644",
        removeOnDelete: false,
        dependsOn: [backup],
    });
    resources.push(sshdConfig);

    const sshDir = runCommand({
        name: `ssh-dir-${adminUser}`,
        create: `
            SSH_DIR="${home}/.ssh"
            mkdir -p "$SSH_DIR"
            chmod 700 "$SSH_DIR"
            chown ${adminUser}:${adminUser} "$SSH_DIR"
        `.trim(),
        dependsOn,
    });
    resources.push(sshDir);

    const keypair = runCommand({
        name: `ssh-keypair-${adminUser}`,
        create: `
            KEY="${home}/.ssh/id_rsa"
            if [ ! -f "$KEY" ] && [ ! -f "$KEY.pub" ]; then
                sudo -u ${adminUser} ssh-keygen -t rsa -b 4096 -N "" -f "$KEY"
                echo "Generated SSH keypair for ${adminUser}"
            else
                echo "SSH keypair for ${adminUser} already exists"
            fi
        `.trim(),
        dependsOn: [sshDir],
    });
    resources.push(keypair);

    const authorizedKeysFile = runCommand({
        name: `ssh-authorized-keys-${adminUser}`,
        create: `
            FILE="${home}/.ssh/authorized_keys"
            cat > "$FILE" << 'HOSTKIT_EOF'
${generateAuthorizedKeys(authorizedKeys)}
HOSTKIT_EOF
            chmod 600 "$FILE"
            chown ${adminUser}:${adminUser} "$FILE"
        `.trim(),
        dependsOn: [sshDir],
    });
    resources.push(authorizedKeysFile);

    const validateConfig = runCommand({
        name: "ssh-validate-config",
        create: `
            sshd -t
            echo "SSH configuration validated successfully"
        `.trim(),
        dependsOn: [sshdConfig],
    });
    resources.push(validateConfig);

    const restartSSHD = runCommand({
        name: "ssh-restart-sshd",
        create: `
            systemctl restart ssh
            echo "SSH daemon restarted with hardened configuration"
        `.trim(),
        dependsOn: [validateConfig, authorizedKeysFile],
    });
    resources.push(restartSSHD);

    const verifySSH = runCommand({
        name: "ssh-verify",
        create: `
            systemctl is-active ssh
            echo "SSH hardening applied successfully"
            echo "  - Password authentication: disabled"
            echo "  - Root login: ${permitRootLogin ? `LAN only (${lanCidr})` : "disabled"}"
            echo "  - Allowed users: ${permitRootLogin ? `${adminUser}, root` : adminUser}"
            echo "  - Authorized keys: ${new Set(authorizedKeys).size} key(s) deployed"
        `.trim(),
        dependsOn: [restartSSHD],
    });
    resources.push(verifySSH);

    return { resources };
}
