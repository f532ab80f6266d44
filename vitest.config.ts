import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["test/**/*.test.ts"],
        exclude: ["dist/**", "node_modules/**"],
        environment: "node",
        env: {
            LOG_LEVEL: "error",
        },
    },
});
