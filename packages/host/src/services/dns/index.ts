/**
 * Cloudflare DNS service
 *
 * Creates one CNAME per compose-stack subdomain pointing at the apex
 * domain. Records are DNS-only (not proxied) so Traefik can complete its
 * ACME challenges; records that already exist, proxied or not, are taken
 * over and updated.
 */

import type * as pulumi from "@pulumi/pulumi";
import * as cloudflare from "@pulumi/cloudflare";
import { runCommand } from "../../lib/command.js";
import type { PropagationCheckOptions, SetupDnsOptions, SetupDnsResult } from "./types.js";

export type { PropagationCheckOptions, SetupDnsOptions, SetupDnsResult } from "./types.js";

/**
 * TTL applied to every record, in seconds
 */
export const RECORD_TTL = 3600;

/** Comment stored on every managed record */
export const RECORD_COMMENT = "Managed by hostkit";

/**
 * Generates the script that waits until every hostname resolves
 */
export function generatePropagationCheckScript(
    hostnames: string[],
    options: PropagationCheckOptions = {}
): string {
    const { initialWait = 30, attempts = 20, interval = 10, settleWait = 60 } = options;

    return `
echo "Waiting ${initialWait}s for DNS records to propagate..."
sleep ${initialWait}
FAILED=""
for name in ${hostnames.join(" ")}; do
    ok=0
    for i in $(seq 1 ${attempts}); do
        if [ -n "$(dig +short "$name")" ]; then
            echo "$name resolves"
            ok=1
            break
        fi
        echo "Waiting for $name (attempt $i/${attempts})..."
        sleep ${interval}
    done
    [ "$ok" = 1 ] || FAILED="$FAILED $name"
done
if [ -n "$FAILED" ]; then
    echo "DNS records did not propagate:$FAILED" >&2
    exit 1
fi
echo "Waiting ${settleWait}s more before certificates are requested..."
sleep ${settleWait}
echo "All DNS records propagated"
`.trim();
}

/**
 * Creates the subdomain CNAME records and, optionally, a propagation check
 */
export function setupDns(options: SetupDnsOptions): SetupDnsResult {
    const { domain, zoneId, subdomains, verify, dependsOn = [] } = options;
    const resources: pulumi.Resource[] = [];
    const records: Record<string, cloudflare.Record> = {};

    for (const subdomain of subdomains) {
        const record = new cloudflare.Record(
            `dns-${subdomain}`,
            {
                zoneId,
                name: subdomain,
                type: "CNAME",
                content: domain,
                ttl: RECORD_TTL,
                proxied: false,
                allowOverwrite: true,
                comment: RECORD_COMMENT,
            },
            { dependsOn }
        );
        records[subdomain] = record;
        resources.push(record);
    }

    const hostnames = subdomains.map((subdomain) => `${subdomain}.${domain}`);

    if (verify && hostnames.length > 0) {
        const check = runCommand({
            name: "dns-propagation-check",
            create: generatePropagationCheckScript(hostnames),
            dependsOn: Object.values(records),
        });
        resources.push(check);
    }

    return { resources, records, hostnames };
}
