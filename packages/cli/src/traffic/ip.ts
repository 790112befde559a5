/**
 * Private / special-purpose address detection
 *
 * Covers the IANA special-purpose ranges that are not globally routable:
 * loopback, RFC 1918, link-local, documentation, benchmarking, reserved
 * and their IPv6 counterparts.
 */

import { BlockList, isIP } from "node:net";

const PRIVATE_IPV4: Array<[string, number]> = [
    ["0.0.0.0", 8],
    ["10.0.0.0", 8],
    ["127.0.0.0", 8],
    ["169.254.0.0", 16],
    ["172.16.0.0", 12],
    ["192.0.0.0", 29],
    ["192.0.0.8", 32],
    ["192.0.0.170", 31],
    ["192.0.2.0", 24],
    ["192.168.0.0", 16],
    ["198.18.0.0", 15],
    ["198.51.100.0", 24],
    ["203.0.113.0", 24],
    ["240.0.0.0", 4],
    ["255.255.255.255", 32],
];

const PRIVATE_IPV6: Array<[string, number]> = [
    ["::1", 128],
    ["::", 128],
    ["64:ff9b:1::", 48],
    ["100::", 64],
    ["2001::", 23],
    ["2001:db8::", 32],
    ["2001:10::", 28],
    ["fc00::", 7],
    ["fe80::", 10],
];

const privateRanges = new BlockList();
for (const [network, prefix] of PRIVATE_IPV4) {
    privateRanges.addSubnet(network, prefix, "ipv4");
}
for (const [network, prefix] of PRIVATE_IPV6) {
    privateRanges.addSubnet(network, prefix, "ipv6");
}

// IPv4-mapped IPv6 lives in its own list: BlockList matches IPv4 addresses
// against IPv6 rules in their mapped form, so in the shared list it would
// cover every IPv4 address
const mappedIpv4 = new BlockList();
mappedIpv4.addSubnet("::ffff:0:0", 96, "ipv6");

/**
 * Returns true for private or reserved addresses; false for anything that
 * is not an IP address at all (such as a rejected hostname)
 */
export function isPrivateAddress(value: string): boolean {
    const family = isIP(value);
    if (family === 4) {
        return privateRanges.check(value, "ipv4");
    }
    if (family === 6) {
        return privateRanges.check(value, "ipv6") || mappedIpv4.check(value, "ipv6");
    }
    return false;
}
