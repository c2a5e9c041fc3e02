import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["Extraction/tests/**/*.test.ts"],
    },
});
