// src/pipeline/inlineDispatcher.ts

import type { StreamBroker } from "../broker/streamBroker.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsRecorder } from "../infrastructure/metricsCollectorInterface.js";
import type { SampleSource } from "../sources/sampleSource.js";
import {
    DispatchInProgressError,
    isActive,
    type DispatchState,
    type Dispatcher,
} from "./dispatcher.js";
import { SignalPipeline, type PipelineSettings } from "./signalPipeline.js";

/**
 * Runs the pipeline as its own async task on the main event loop.
 */
export class InlineDispatcher implements Dispatcher {
    public readonly mode = "inline";
    private currentState: DispatchState = "idle";
    private pipeline: SignalPipeline | undefined;
    private task: Promise<void> | undefined;

    constructor(
        private readonly signalId: string,
        private readonly createSource: () => SampleSource,
        private readonly broker: StreamBroker,
        private readonly settings: PipelineSettings,
        private readonly logger: ILogger,
        private readonly metrics: IMetricsRecorder
    ) {}

    public start(): void {
        if (isActive(this.currentState)) {
            throw new DispatchInProgressError(this.signalId);
        }

        const pipeline = new SignalPipeline(
            this.signalId,
            this.createSource(),
            this.broker,
            this.settings,
            this.logger,
            this.metrics
        );
        this.pipeline = pipeline;
        this.currentState = "running";

        this.task = pipeline.run().then(
            (outcome) => {
                if (this.pipeline === pipeline) this.currentState = outcome;
            },
            (error: unknown) => {
                // Only non-sample errors get here; subscribers must not hang
                if (this.pipeline === pipeline) this.currentState = "failed";
                this.logger.error("Signal pipeline crashed", {
                    signalId: this.signalId,
                    error,
                });
                this.broker.terminate(
                    "SourceUnavailable",
                    error instanceof Error ? error.message : String(error)
                );
            }
        );
    }

    public async stop(): Promise<void> {
        const pipeline = this.pipeline;
        if (!pipeline || !isActive(this.currentState)) return;
        this.currentState = "stopping";
        await pipeline.stop();
        await this.task;
        this.currentState = "stopped";
    }

    public get state(): DispatchState {
        return this.currentState;
    }

    /**
     * Pipeline of the current dispatch, if any
     */
    public getPipeline(): SignalPipeline | undefined {
        return this.pipeline;
    }
}
