import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["packages/*/tests/**/*.test.ts"],
        environment: "node",
        // scanner tests chdir, which worker threads do not allow
        pool: "forks",
        clearMocks: true,
    },
});
