// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        globals: true, // describe/it/expect as globals
        include: ["test/**/*.test.ts"],
        setupFiles: ["./test/vitest.setup.ts"],
        coverage: {
            reporter: ["text", "html"],
            reportsDirectory: "./coverage",
            include: ["src"],
        },
        pool: "threads",
        poolOptions: {
            threads: {
                maxThreads: 2,
                minThreads: 1,
            },
        },
        isolate: true,
        clearMocks: true,
        restoreMocks: true,
    },
});
