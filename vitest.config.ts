import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["src/**/__tests__/**/*.test.ts"],
        exclude: ["**/node_modules/**", "**/dist/**"],
        // Stores write to temp files and the dispatcher is serialized; keep runs sequential
        sequence: {
            concurrent: false,
        },
    },
});
