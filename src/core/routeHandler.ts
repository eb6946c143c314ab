// src/core/routeHandler.ts
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsRecorder } from "../infrastructure/metricsCollectorInterface.js";
import type { HttpResult } from "./signalController.js";

export interface RouteDependencies {
    logger: ILogger;
    metricsCollector: IMetricsRecorder;
}

/**
 * Run one route handler under a correlation id scoped to `context`.
 * A thrown error becomes a 500 result carrying the correlation id.
 */
export async function runRoute(
    deps: RouteDependencies,
    context: string,
    correlationId: string,
    handler: () => HttpResult | Promise<HttpResult>
): Promise<HttpResult> {
    deps.logger.setCorrelationId(correlationId, context);
    try {
        return await handler();
    } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        handleError(deps, err, context, correlationId);
        return {
            status: 500,
            body: { status: "error", error: err.message, correlationId },
        };
    } finally {
        deps.logger.removeCorrelationId(correlationId);
    }
}

/**
 * Handle errors
 */
export function handleError(
    deps: RouteDependencies,
    error: Error,
    context: string,
    correlationId: string
): void {
    deps.metricsCollector.incrementCounter("http_errors_total", 1, { context });
    deps.logger.error(
        `[${context}] ${error.message}`,
        {
            context,
            errorName: error.name,
            errorMessage: error.message,
            stack: error.stack,
            timestamp: new Date().toISOString(),
        },
        correlationId
    );
}
