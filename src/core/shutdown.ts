// src/core/shutdown.ts
import type { Dependencies } from "./dependencies.js";

export interface Stoppable {
    stop(): Promise<void>;
}

/**
 * Stop ingestion, end every stream with a Shutdown terminal event, give
 * sessions the grace period to flush, then close the listener.
 */
export async function shutdownService(
    dependencies: Pick<Dependencies, "logger" | "registry" | "endpoint">,
    server: Stoppable
): Promise<void> {
    const { logger, registry, endpoint } = dependencies;
    logger.info("Shutting down derivative stream service");

    await registry.stopAll();
    registry.closeAll();
    await endpoint.shutdown();
    await server.stop();

    logger.info("Shutdown complete");
}
