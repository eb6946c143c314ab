// src/core/dependencies.ts

import { EventStreamEndpoint } from "../endpoint/eventStreamEndpoint.js";
import { Logger } from "../infrastructure/logger.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import { MetricsCollector } from "../infrastructure/metricsCollector.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import { SignalRegistry } from "../pipeline/signalRegistry.js";
import { Config } from "./config.js";
import { SignalController } from "./signalController.js";

/**
 * Application dependencies interface
 */
export interface Dependencies {
    // Infrastructure
    logger: ILogger;
    metricsCollector: IMetricsCollector;

    // Streaming
    registry: SignalRegistry;
    endpoint: EventStreamEndpoint;
    controller: SignalController;
}

/**
 * Factory function to create dependencies. Every configured signal is
 * registered but none is started here.
 */
export function createDependencies(
    logger: ILogger = new Logger(Config.LOG_PRETTY, Config.LOG_LEVEL)
): Dependencies {
    const metricsCollector = new MetricsCollector();

    const registry = new SignalRegistry(
        { broker: Config.BROKER, pipeline: Config.PIPELINE },
        logger,
        metricsCollector
    );
    for (const signal of Config.SIGNALS) {
        registry.register(signal);
    }

    const endpoint = new EventStreamEndpoint(
        Config.ENDPOINT,
        logger,
        metricsCollector
    );

    return {
        logger,
        metricsCollector,
        registry,
        endpoint,
        controller: new SignalController(registry, endpoint, metricsCollector),
    };
}
