/**
 * Package catalogue
 *
 * Maps every optional package id to the way it gets installed. Items with
 * their own vendor apt repository (Docker, Plex, 1Password) add the signing
 * key and source list first; the rest come from Debian's archive.
 */

import type { OptionalPackage } from "@hostkit/shared";
import type { PackageRecipe } from "./types.js";

/**
 * Installed on every host, before anything else
 */
export const CRITICAL_APT_PACKAGES = [
    "sudo", // Admin user privileges
    "curl", // Vendor key downloads
    "ca-certificates", // TLS for vendor repositories
    "gnupg", // Key dearmoring
    "cifs-utils", // SMB mounts
    "smbclient", // SMB share discovery
    "nmap", // SMB host discovery
    "dnsutils", // dig, DNS propagation checks
    "geoip-bin", // geoiplookup for traffic reports
];

/**
 * Packages from Docker's apt repository
 */
export const DOCKER_APT_PACKAGES = [
    "containerd.io",
    "docker-buildx-plugin",
    "docker-ce",
    "docker-ce-cli",
    "docker-compose-plugin",
];

/**
 * NVM release installed for the admin user and root
 */
export const NVM_VERSION = "0.40.1";

const ONEPASSWORD_POLICY_ID = "AC2D62742012EA22";

/**
 * Shell test that succeeds when a dpkg package is fully installed
 */
export function isInstalledCheck(pkg: string): string {
    return `dpkg -l ${pkg} 2>/dev/null | grep -q "^ii"`;
}

/**
 * Adds Docker's apt repository and signing key
 */
export function generateDockerRepoScript(): string {
    return `
set -e
install -m 0755 -d /etc/apt/keyrings
if [ ! -f /etc/apt/keyrings/docker.gpg ]; then
    curl -fsSL https://download.docker.com/linux/debian/gpg | gpg --dearmor -o /etc/apt/keyrings/docker.gpg
fi
chmod a+r /etc/apt/keyrings/docker.gpg
. /etc/os-release
echo "deb [arch=$(dpkg --print-architecture) signed-by=/etc/apt/keyrings/docker.gpg] https://download.docker.com/linux/debian $VERSION_CODENAME stable" > /etc/apt/sources.list.d/docker.list
apt-get update
echo "Docker repository configured"
`.trim();
}

/**
 * Installs Plex Media Server from its vendor repository and starts it
 */
export function generatePlexScript(): string {
    return `
set -e
if ${isInstalledCheck("plexmediaserver")}; then
    echo "Plex Media Server already installed"
    exit 0
fi
export DEBIAN_FRONTEND=noninteractive
curl -fsSL https://downloads.plex.tv/plex-keys/PlexSign.key | gpg --dearmor --yes -o /usr/share/keyrings/plex.gpg
echo "deb [signed-by=/usr/share/keyrings/plex.gpg] https://downloads.plex.tv/repo/deb public main" > /etc/apt/sources.list.d/plexmediaserver.list
apt-get update
apt-get install -y plexmediaserver
systemctl enable plexmediaserver
systemctl start plexmediaserver
echo "Plex Media Server installed"
`.trim();
}

/**
 * Installs the 1Password CLI with its repository and debsig policy
 */
export function generateOnePasswordScript(): string {
    const policyDir = `/etc/debsig/policies/${ONEPASSWORD_POLICY_ID}`;
    const keyringDir = `/usr/share/debsig/keyrings/${ONEPASSWORD_POLICY_ID}`;
    return `
set -e
if ${isInstalledCheck("1password-cli")}; then
    echo "1Password CLI already installed"
    exit 0
fi
export DEBIAN_FRONTEND=noninteractive
apt-get install -y gnupg2 apt-transport-https ca-certificates software-properties-common
curl -sS https://downloads.1password.com/linux/keys/1password.asc | gpg --dearmor --yes --output /usr/share/keyrings/1password-archive-keyring.gpg
echo "deb [arch=amd64 signed-by=/usr/share/keyrings/1password-archive-keyring.gpg] https://downloads.1password.com/linux/debian/amd64 stable main" > /etc/apt/sources.list.d/1password.list
mkdir -p ${policyDir}
curl -sS https://downloads.1password.com/linux/debian/debsig/1password.pol > ${policyDir}/1password.pol
mkdir -p ${keyringDir}
curl -sS https://downloads.1password.com/linux/keys/1password.asc | gpg --dearmor --yes --output ${keyringDir}/debsig.gpg
apt-get update
apt-get install -y 1password-cli
echo "1Password CLI installed: $(op --version)"
`.trim();
}

/**
 * Installs the Bitwarden CLI from npm
 */
export function generateBitwardenScript(): string {
    return `
set -e
if command -v bw >/dev/null; then
    echo "Bitwarden CLI already installed"
    exit 0
fi
export DEBIAN_FRONTEND=noninteractive
apt-get install -y build-essential npm
npm install -g @bitwarden/cli
echo "Bitwarden CLI installed: $(bw --version)"
`.trim();
}

/**
 * Installs NVM and the current LTS Node.js for one user
 */
export function generateNvmUserScript(username: string, home: string): string {
    return `
if [ ! -s "${home}/.nvm/nvm.sh" ]; then
    sudo -u ${username} env HOME="${home}" PROFILE=/dev/null bash -c 'curl -fsSL https://raw.githubusercontent.com/nvm-sh/nvm/v${NVM_VERSION}/install.sh | bash'
fi
if ! grep -q NVM_DIR "${home}/.bashrc" 2>/dev/null; then
    cat >> "${home}/.bashrc" << 'NVM_EOF'

export NVM_DIR="$HOME/.nvm"
[ -s "$NVM_DIR/nvm.sh" ] && . "$NVM_DIR/nvm.sh"
[ -s "$NVM_DIR/bash_completion" ] && . "$NVM_DIR/bash_completion"
NVM_EOF
    chown ${username}: "${home}/.bashrc"
fi
sudo -u ${username} env HOME="${home}" bash -c '. "$HOME/.nvm/nvm.sh" && nvm install --lts'
`.trim();
}

/**
 * Installs NVM for the admin user and for root
 */
export function generateNvmScript(adminUser: string): string {
    return [
        "set -e",
        `ADMIN_HOME=$(getent passwd ${adminUser} | cut -d: -f6)`,
        generateNvmUserScript(adminUser, "$ADMIN_HOME"),
        generateNvmUserScript("root", "/root"),
        'echo "NVM installed for ' + adminUser + ' and root"',
    ].join("\n");
}

function apt(...packages: string[]): PackageRecipe {
    return { kind: "apt", packages };
}

/**
 * Installation recipe for every optional package
 */
export const PACKAGE_CATALOG: Record<OptionalPackage, PackageRecipe> = {
    "1password-cli": { kind: "script", script: () => generateOnePasswordScript() },
    "bitwarden-cli": { kind: "script", script: () => generateBitwardenScript() },
    certbot: apt("certbot"),
    cmake: apt("cmake"),
    docker: apt(...DOCKER_APT_PACKAGES),
    fail2ban: apt("fail2ban"),
    fdupes: apt("fdupes"),
    ffmpeg: apt("ffmpeg"),
    nginx: apt("nginx"),
    nodejs: apt("nodejs"),
    npm: apt("npm"),
    nvm: { kind: "script", script: (adminUser) => generateNvmScript(adminUser) },
    pandoc: apt("pandoc"),
    plex: { kind: "script", script: () => generatePlexScript() },
};

/**
 * Collects the apt packages of the selected catalogue items
 */
export function collectAptPackages(selected: OptionalPackage[]): string[] {
    const packages: string[] = [];
    for (const id of selected) {
        const recipe = PACKAGE_CATALOG[id];
        if (recipe.kind === "apt") {
            packages.push(...recipe.packages.filter((pkg) => !packages.includes(pkg)));
        }
    }
    return packages;
}
