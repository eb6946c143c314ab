// src/index.ts
import { Config } from "./core/config.js";
import { createDependencies } from "./core/dependencies.js";
import { ConfigurationError } from "./core/errors.js";
import { HttpServer } from "./core/httpServer.js";
import { shutdownService } from "./core/shutdown.js";

/**
 * Main entry point for the derivative stream service
 */
export async function main(): Promise<void> {
    try {
        const dependencies = createDependencies();
        const server = new HttpServer(dependencies, {
            host: Config.HTTP_HOST,
            port: Config.HTTP_PORT,
            defaultSignal: Config.DEFAULT_SIGNAL,
        });

        await server.start();
        dependencies.registry.startAutoStart();

        let stopping = false;
        const onSignal = (signal: NodeJS.Signals): void => {
            if (stopping) return;
            stopping = true;
            dependencies.logger.info("Received shutdown signal", { signal });
            void shutdownService(dependencies, server).then(
                () => process.exit(0),
                (error: unknown) => {
                    // Logging infrastructure may already be gone here
                    console.error("Error during shutdown:", error);
                    process.exit(1);
                }
            );
        };

        process.on("SIGINT", onSignal);
        process.on("SIGTERM", onSignal);
    } catch (error: unknown) {
        const err = error instanceof Error ? error : new Error(String(error));
        // Logger is not available yet when startup fails
        console.error("CRITICAL STARTUP FAILURE:", err.message);
        if (error instanceof ConfigurationError) {
            for (const issue of error.issues) {
                console.error(`  - ${issue}`);
            }
        } else {
            console.error("Stack trace:", err.stack);
        }
        process.exit(1);
    }
}

void main();
