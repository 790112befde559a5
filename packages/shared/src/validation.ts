/**
 * Validation helpers for host configuration values
 *
 * Shared by the Pulumi config loader and the setup wizard.
 */

import { isIPv4 } from "node:net";

const USERNAME_PATTERN = /^[a-z_][a-z0-9_-]*$/;
const SUBDOMAIN_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

/**
 * Returns true for an IPv4 CIDR such as 192.168.1.0/24
 */
export function isValidCidr(value: string): boolean {
    const [address, prefix, ...rest] = value.split("/");
    if (rest.length > 0 || address === undefined || prefix === undefined) {
        return false;
    }
    if (!/^\d{1,2}$/.test(prefix) || Number(prefix) > 32) {
        return false;
    }
    return isIPv4(address);
}

/**
 * Returns true for a usable non-root Linux username
 */
export function isValidUsername(value: string): boolean {
    return value !== "root" && value.length <= 32 && USERNAME_PATTERN.test(value);
}

/**
 * Returns true for a single DNS label
 */
export function isValidSubdomain(value: string): boolean {
    return value.length <= 63 && SUBDOMAIN_PATTERN.test(value);
}

/**
 * Returns true for HH:MM (24h)
 */
export function isValidTime(value: string): boolean {
    return TIME_PATTERN.test(value);
}

/**
 * Returns true for an SSH public key line (type, base64 body, optional comment)
 */
export function isValidPublicKey(value: string): boolean {
    return /^(ssh-(ed25519|rsa|dss)|ecdsa-sha2-nistp\d+|sk-[a-z0-9@.-]+) \S+/.test(value.trim());
}

/**
 * Narrows an unknown config value to a string array
 */
export function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === "string");
}
