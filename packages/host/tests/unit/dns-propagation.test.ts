/**
 * Unit tests for the DNS propagation check script
 */

import { describe, it, expect } from "vitest";

import { generatePropagationCheckScript } from "../../src/services/dns/index.js";

describe("generatePropagationCheckScript", () => {
    it("should wait 30s, poll 20 times 10s apart, then settle for 60s", () => {
        const script = generatePropagationCheckScript(["a.example.com"]);

        expect(script.split("\n").slice(0, 2)).toEqual([
            'echo "Waiting 30s for DNS records to propagate..."',
            "sleep 30",
        ]);
        expect(script).toContain("for i in $(seq 1 20); do");
        expect(script).toContain("    sleep 10\n");
        expect(script).toContain("sleep 60\n");
    });

    it("should check every hostname with dig", () => {
        const script = generatePropagationCheckScript(["a.example.com", "b.example.com"]);

        expect(script).toContain("for name in a.example.com b.example.com; do");
        expect(script).toContain('if [ -n "$(dig +short "$name")" ]; then');
    });

    it("should fail listing the hostnames that never resolved", () => {
        const script = generatePropagationCheckScript(["a.example.com"]);

        expect(script).toContain('echo "DNS records did not propagate:$FAILED" >&2\n    exit 1');
    });

    it("should accept custom timings", () => {
        const script = generatePropagationCheckScript(["a.example.com"], {
            initialWait: 1,
            attempts: 2,
            interval: 3,
            settleWait: 4,
        });

        expect(script).toContain("sleep 1\n");
        expect(script).toContain("for i in $(seq 1 2); do");
        expect(script).toContain("    sleep 3\n");
        expect(script).toContain("sleep 4\n");
    });
});
