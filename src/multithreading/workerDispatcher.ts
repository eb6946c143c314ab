// src/multithreading/workerDispatcher.ts
import { Worker } from "worker_threads";
import type { StreamBroker } from "../broker/streamBroker.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsRecorder } from "../infrastructure/metricsCollectorInterface.js";
import {
    DispatchInProgressError,
    isActive,
    type DispatchState,
    type Dispatcher,
} from "../pipeline/dispatcher.js";
import type {
    PipelineSettings,
    PipelineStats,
} from "../pipeline/signalPipeline.js";
import type { TransferableSourceSpec } from "../sources/sampleSource.js";
import {
    WorkerOutboundMessageSchema,
    type MetricsMessage,
    type ProxyLogMessage,
    type StopMessage,
    type WorkerInitData,
    type WorkerOutboundMessage,
} from "./shared/messageSchemas.js";

export interface WorkerDispatcherOptions {
    /** Compiled worker entry; defaults to the estimator worker beside this file */
    workerUrl?: URL;
    /** How long a stopped worker gets to exit before it is terminated */
    stopTimeoutMs?: number;
}

const DEFAULT_STOP_TIMEOUT_MS = 5000;

/**
 * Hosts one signal's pipeline in a worker thread. The worker's output comes
 * back as messages; they are validated and applied to the broker on the
 * main event loop, in the order the worker sent them.
 */
export class WorkerDispatcher implements Dispatcher {
    public readonly mode = "worker";
    private currentState: DispatchState = "idle";
    private worker: Worker | undefined;
    private exited: Promise<void> | undefined;
    private lastStats: PipelineStats | undefined;
    private readonly workerUrl: URL;
    private readonly stopTimeoutMs: number;

    constructor(
        private readonly signalId: string,
        private readonly source: TransferableSourceSpec,
        private readonly broker: StreamBroker,
        private readonly settings: PipelineSettings,
        private readonly logger: ILogger,
        private readonly metrics: IMetricsRecorder,
        options: WorkerDispatcherOptions = {}
    ) {
        this.workerUrl =
            options.workerUrl ??
            new URL("./workers/estimatorWorker.js", import.meta.url);
        this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    }

    public start(): void {
        if (isActive(this.currentState)) {
            throw new DispatchInProgressError(this.signalId);
        }

        const workerData: WorkerInitData = {
            signalId: this.signalId,
            source: this.source,
            settings: this.settings,
            debugLogging: this.logger.isDebugEnabled(),
        };
        const worker = new Worker(this.workerUrl, { workerData });
        this.worker = worker;
        this.lastStats = undefined;
        this.currentState = "running";

        this.exited = new Promise<void>((resolve) => {
            worker.once("exit", (code: number) => {
                this.handleExit(worker, code);
                resolve();
            });
        });
        worker.on("message", (message: unknown) => {
            this.routeMessage(worker, message);
        });
        worker.on("error", (error: Error) => {
            this.handleWorkerError(worker, error);
        });

        this.logger.info("Estimator worker started", {
            signalId: this.signalId,
            source: this.source.kind,
            threadId: worker.threadId,
        });
    }

    public async stop(): Promise<void> {
        const worker = this.worker;
        if (!worker || !isActive(this.currentState)) return;

        this.currentState = "stopping";
        const stop: StopMessage = { type: "stop" };
        worker.postMessage(stop);
        await this.waitForExit(worker);
        this.currentState = "stopped";
    }

    public get state(): DispatchState {
        return this.currentState;
    }

    /**
     * Counters the worker reported when its pipeline last finished
     */
    public getLastStats(): PipelineStats | undefined {
        return this.lastStats;
    }

    private routeMessage(worker: Worker, raw: unknown): void {
        if (worker !== this.worker) return;

        const parsed = WorkerOutboundMessageSchema.safeParse(raw);
        if (!parsed.success) {
            this.logger.warn("Invalid message from estimator worker", {
                signalId: this.signalId,
                error: parsed.error.message,
            });
            return;
        }

        const message: WorkerOutboundMessage = parsed.data;
        switch (message.type) {
            case "point":
                this.broker.publish(Object.freeze({ x: message.x, y: message.y }));
                break;
            case "terminal":
                this.broker.terminate(message.reason, message.message);
                break;
            case "log_message":
                this.forwardLog(message);
                break;
            case "metrics":
                this.forwardMetric(message);
                break;
            case "pipeline_exit":
                this.lastStats = message.stats;
                if (this.currentState === "running") {
                    this.currentState = message.outcome;
                }
                break;
            case "pipeline_error":
                this.fail(`Estimator worker crashed: ${message.message}`);
                break;
        }
    }

    private forwardLog(message: ProxyLogMessage): void {
        const { level, context, correlationId } = message.data;
        const text = message.data.message;
        switch (level) {
            case "info":
                this.logger.info(text, context, correlationId);
                break;
            case "warn":
                this.logger.warn(text, context, correlationId);
                break;
            case "error":
                this.logger.error(text, context, correlationId);
                break;
            case "debug":
                this.logger.debug(text, context, correlationId);
                break;
        }
    }

    private forwardMetric(message: MetricsMessage): void {
        switch (message.action) {
            case "increment":
                this.metrics.incrementCounter(message.name, message.value, message.labels);
                break;
            case "gauge":
                this.metrics.setGauge(message.name, message.value, message.labels);
                break;
            case "histogram":
                this.metrics.recordHistogram(message.name, message.value, message.labels);
                break;
        }
    }

    private handleWorkerError(worker: Worker, error: Error): void {
        if (worker !== this.worker) return;
        this.fail(`Estimator worker error: ${error.message}`);
    }

    private handleExit(worker: Worker, code: number): void {
        if (worker !== this.worker) return;
        this.logger.info("Estimator worker exited", {
            signalId: this.signalId,
            exitCode: code,
        });
        // Exiting without reporting an outcome means the pipeline died
        if (this.currentState === "running") {
            this.fail(`Estimator worker exited with code ${code}`);
        }
    }

    private fail(message: string): void {
        if (this.currentState === "failed") return;
        this.currentState = "failed";
        this.logger.error("Estimator worker failed", {
            signalId: this.signalId,
            error: message,
        });
        this.broker.terminate("SourceUnavailable", message);
    }

    private waitForExit(worker: Worker): Promise<void> {
        const exited = this.exited ?? Promise.resolve();
        return new Promise<void>((resolve) => {
            const timeout = setTimeout(() => {
                this.logger.warn("Estimator worker did not exit, terminating", {
                    signalId: this.signalId,
                    timeoutMs: this.stopTimeoutMs,
                });
                worker
                    .terminate()
                    .catch((error: unknown) => {
                        this.logger.error("Error terminating estimator worker", {
                            signalId: this.signalId,
                            error: error instanceof Error ? error.message : String(error),
                        });
                    })
                    .finally(() => resolve());
            }, this.stopTimeoutMs);

            void exited.then(() => {
                clearTimeout(timeout);
                resolve();
            });
        });
    }
}
