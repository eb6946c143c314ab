// src/utils/retryHandler.ts
import { ProductionUtils } from "./productionUtils.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsRecorder } from "../infrastructure/metricsCollectorInterface.js";

export interface RetryConfig {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    jitter: boolean;
    retryIf?: (error: Error) => boolean;
}

export interface RetryContext {
    operation: string;
    component: string;
    correlationId?: string;
    logger?: ILogger;
    metricsCollector?: IMetricsRecorder;
    signal?: AbortSignal;
}

export class RetryError extends Error {
    constructor(
        message: string,
        public readonly attempts: number,
        public readonly lastError: Error,
        public readonly context: RetryContext
    ) {
        super(message);
        this.name = "RetryError";
    }
}

export class RetryHandler {
    /**
     * Build a config from a retry limit, i.e. the number of retries after the
     * first attempt.
     */
    public static fromRetryLimit(
        maxRetries: number,
        backoff: Omit<RetryConfig, "maxAttempts">
    ): RetryConfig {
        return { ...backoff, maxAttempts: maxRetries + 1 };
    }

    /**
     * Execute operation with exponential backoff retry
     */
    public static async executeWithRetry<T>(
        operation: () => Promise<T>,
        config: RetryConfig,
        context: RetryContext
    ): Promise<T> {
        let lastError = new Error(`${context.operation} was never attempted`);
        let attempt = 0;

        while (attempt < config.maxAttempts) {
            attempt++;
            try {
                const result = await operation();

                if (attempt > 1) {
                    context.logger?.info(
                        `[${context.component}] ${context.operation} succeeded after ${attempt} attempts`,
                        { operation: context.operation, attempts: attempt },
                        context.correlationId
                    );
                    context.metricsCollector?.recordHistogram(
                        "retry_attempts_until_success",
                        attempt,
                        { component: context.component }
                    );
                }

                return result;
            } catch (error) {
                lastError =
                    error instanceof Error ? error : new Error(String(error));

                if (context.signal?.aborted) {
                    throw lastError;
                }

                if (config.retryIf && !config.retryIf(lastError)) {
                    context.logger?.warn(
                        `[${context.component}] ${context.operation} failed with non-retryable error`,
                        {
                            operation: context.operation,
                            attempt,
                            error: lastError.message,
                        },
                        context.correlationId
                    );
                    break;
                }

                if (attempt === config.maxAttempts) {
                    break;
                }

                const delayMs = this.calculateBackoffDelay(
                    attempt,
                    config.baseDelayMs,
                    config.maxDelayMs,
                    config.backoffMultiplier,
                    config.jitter
                );

                context.logger?.warn(
                    `[${context.component}] ${context.operation} failed, retrying in ${delayMs}ms`,
                    {
                        operation: context.operation,
                        attempt,
                        maxAttempts: config.maxAttempts,
                        delayMs,
                        error: lastError.message,
                    },
                    context.correlationId
                );
                context.metricsCollector?.incrementCounter(
                    "source_retry_attempts_total",
                    1,
                    { component: context.component }
                );

                await ProductionUtils.sleep(delayMs, context.signal);
            }
        }

        const retryError = new RetryError(
            `${context.operation} failed after ${attempt} attempts: ${lastError.message}`,
            attempt,
            lastError,
            context
        );

        context.logger?.error(
            `[${context.component}] ${context.operation} failed permanently`,
            {
                operation: context.operation,
                totalAttempts: attempt,
                finalError: lastError.message,
            },
            context.correlationId
        );
        context.metricsCollector?.incrementCounter("retry_exhausted_total", 1, {
            component: context.component,
        });

        throw retryError;
    }

    /**
     * Exponential backoff capped at maxDelayMs, with optional ±5% jitter
     */
    public static calculateBackoffDelay(
        attempt: number,
        baseDelayMs: number,
        maxDelayMs: number,
        backoffMultiplier: number,
        jitter: boolean
    ): number {
        const exponentialDelay =
            baseDelayMs * Math.pow(backoffMultiplier, attempt - 1);
        const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

        if (jitter) {
            const jitterRange = cappedDelay * 0.1;
            const jitterOffset = (Math.random() - 0.5) * jitterRange;
            return Math.max(
                0,
                Math.min(maxDelayMs, Math.round(cappedDelay + jitterOffset))
            );
        }

        return Math.round(cappedDelay);
    }
}
