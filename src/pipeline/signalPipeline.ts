// src/pipeline/signalPipeline.ts

import {
    SampleRejectedError,
    SourceUnavailableError,
} from "../core/errors.js";
import {
    DerivativeEstimator,
    type DerivativeEstimatorOptions,
} from "../estimation/derivativeEstimator.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsRecorder } from "../infrastructure/metricsCollectorInterface.js";
import type { SampleSource } from "../sources/sampleSource.js";
import type { PointSink, Sample } from "../types/streamTypes.js";
import { ProductionUtils } from "../utils/productionUtils.js";
import { RetryError, RetryHandler } from "../utils/retryHandler.js";

export interface SourceRetrySettings {
    /** Retries after the first failed attempt */
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    jitter: boolean;
}

export interface PipelineSettings {
    estimator: DerivativeEstimatorOptions;
    retry: SourceRetrySettings;
    /** Samples processed between event-loop yields */
    yieldEvery: number;
}

export type PipelineOutcome = "completed" | "failed" | "stopped";

export interface PipelineStats {
    samplesIngested: number;
    pointsPublished: number;
    samplesRejected: number;
}

/**
 * SampleSource → DerivativeEstimator → PointSink for one signal.
 *
 * Per-sample rejections are logged and counted without stopping the loop.
 * Running out of acquisition retries terminates the sink with
 * SourceUnavailable; a finished source terminates it with EndOfStream.
 */
export class SignalPipeline {
    private readonly estimator: DerivativeEstimator;
    private readonly abort = new AbortController();
    private running: Promise<PipelineOutcome> | undefined;
    private readonly stats: PipelineStats = {
        samplesIngested: 0,
        pointsPublished: 0,
        samplesRejected: 0,
    };

    constructor(
        public readonly signalId: string,
        private readonly source: SampleSource,
        private readonly sink: PointSink,
        private readonly settings: PipelineSettings,
        private readonly logger: ILogger,
        private readonly metrics: IMetricsRecorder
    ) {
        this.estimator = new DerivativeEstimator(settings.estimator);
    }

    public run(): Promise<PipelineOutcome> {
        if (!this.running) {
            this.running = this.loop();
        }
        return this.running;
    }

    /**
     * Stop ingesting. Resolves once the loop has exited and the source is closed.
     */
    public async stop(): Promise<void> {
        this.abort.abort();
        await this.source.close();
        if (this.running) {
            await this.running;
        }
    }

    public getStats(): PipelineStats {
        return { ...this.stats };
    }

    public get isStopping(): boolean {
        return this.abort.signal.aborted;
    }

    private async loop(): Promise<PipelineOutcome> {
        this.logger.info("Signal pipeline started", {
            signalId: this.signalId,
            source: this.source.name,
            windowSize: this.estimator.windowSize,
            method: this.estimator.method,
        });

        let processed = 0;
        try {
            while (!this.abort.signal.aborted) {
                let sample: Sample | undefined;
                try {
                    sample = await this.acquire();
                } catch (error) {
                    if (this.abort.signal.aborted) break;
                    if (error instanceof RetryError) {
                        this.fail(error);
                        return "failed";
                    }
                    throw error;
                }

                if (sample === undefined) {
                    if (this.abort.signal.aborted) break;
                    this.sink.terminate(
                        "EndOfStream",
                        `Source ${this.source.name} has no more samples`
                    );
                    this.logger.info("Signal source exhausted", {
                        signalId: this.signalId,
                        ...this.stats,
                    });
                    return "completed";
                }

                this.process(sample);

                processed++;
                if (processed % this.settings.yieldEvery === 0) {
                    await ProductionUtils.yieldToEventLoop();
                }
            }
        } finally {
            await this.source.close();
        }

        this.logger.info("Signal pipeline stopped", {
            signalId: this.signalId,
            ...this.stats,
        });
        return "stopped";
    }

    private acquire(): Promise<Sample | undefined> {
        return RetryHandler.executeWithRetry(
            () => this.source.next(),
            RetryHandler.fromRetryLimit(this.settings.retry.maxRetries, {
                baseDelayMs: this.settings.retry.baseDelayMs,
                maxDelayMs: this.settings.retry.maxDelayMs,
                backoffMultiplier: this.settings.retry.backoffMultiplier,
                jitter: this.settings.retry.jitter,
            }),
            {
                operation: "acquire_sample",
                component: `pipeline:${this.signalId}`,
                logger: this.logger,
                metricsCollector: this.metrics,
                signal: this.abort.signal,
            }
        );
    }

    private process(sample: Sample): void {
        const labels = { signal: this.signalId };
        const startedAt = performance.now();
        try {
            const point = this.estimator.ingest(sample);
            this.stats.samplesIngested++;
            this.metrics.incrementCounter("samples_ingested_total", 1, labels);
            if (point) {
                this.sink.publish(point);
                this.stats.pointsPublished++;
            }
        } catch (error) {
            if (!(error instanceof SampleRejectedError)) throw error;
            this.stats.samplesRejected++;
            this.metrics.incrementCounter("samples_rejected_total", 1, {
                ...labels,
                reason: error.reason,
            });
            this.logger.warn("Sample rejected", {
                signalId: this.signalId,
                reason: error.reason,
                timestamp: error.sample.timestamp,
                value: error.sample.value,
                detail: error.message,
            });
        } finally {
            this.metrics.recordHistogram(
                "ingest_latency_ms",
                performance.now() - startedAt,
                labels
            );
        }
    }

    private fail(error: RetryError): void {
        const unavailable = new SourceUnavailableError(
            `Source ${this.source.name} unavailable after ${error.attempts} attempts: ${error.lastError.message}`,
            this.signalId,
            error.attempts,
            error.lastError
        );
        this.metrics.incrementCounter("source_unavailable_total", 1, {
            signal: this.signalId,
        });
        this.logger.error("Signal source unavailable", {
            signalId: this.signalId,
            attempts: unavailable.attempts,
            error: unavailable.message,
        });
        this.sink.terminate("SourceUnavailable", unavailable.message);
    }
}
