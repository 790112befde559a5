/**
 * Platform Detection Utilities
 *
 * Provides platform detection and OS-specific helpers. Provisioning only
 * targets Debian-family Linux hosts; the other platforms are recognised so
 * that the tools can refuse to run with a clear message.
 */

import * as os from "node:os";

/**
 * Known platforms
 */
export type Platform = "linux" | "darwin" | "win32" | "other";

/**
 * Detects the current platform
 */
export function detectPlatform(): Platform {
    const platform = process.platform;
    if (platform === "linux" || platform === "darwin" || platform === "win32") {
        return platform;
    }
    return "other";
}

/**
 * Returns true if running on Linux
 */
export function isLinux(): boolean {
    return process.platform === "linux";
}

/**
 * Returns true if running on macOS
 */
export function isMacOS(): boolean {
    return process.platform === "darwin";
}

/**
 * Returns true if running on Windows
 */
export function isWindows(): boolean {
    return process.platform === "win32";
}

/**
 * Returns a human-readable display name for the platform
 */
export function getPlatformDisplayName(platform?: Platform): string {
    const p = platform ?? detectPlatform();
    switch (p) {
        case "linux":
            return "Linux";
        case "darwin":
            return "macOS";
        case "win32":
            return "Windows";
        default:
            return `Unknown (${process.platform})`;
    }
}

/**
 * Gets the current username
 */
export function getCurrentUsername(): string {
    return os.userInfo().username;
}

/**
 * Checks if the current platform can be provisioned
 */
export function isSupportedPlatform(): boolean {
    return isLinux();
}

/**
 * Throws an error if the platform cannot be provisioned
 */
export function assertSupportedPlatform(): void {
    if (isSupportedPlatform()) {
        return;
    }
    if (isWindows()) {
        throw new Error(
            "Windows is not supported for host provisioning.\n" +
                "Please run from WSL2 (Windows Subsystem for Linux) on the target host."
        );
    }
    if (isMacOS()) {
        throw new Error(
            "macOS is not supported for host provisioning.\n" +
                "Run hostkit on the Debian host you want to configure."
        );
    }
    throw new Error(`Unsupported platform: ${process.platform}`);
}

/**
 * Logs a banner naming the running tool and the current platform
 */
export function logPlatformBanner(title: string): void {
    const displayName = getPlatformDisplayName();

    console.log("");
    console.log("================================================================================");
    console.log(`  ${title} - Running on ${displayName}`);
    console.log("================================================================================");
    console.log("");
}
