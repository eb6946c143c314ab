// src/pipeline/signalRegistry.ts

import { StreamBroker } from "../broker/streamBroker.js";
import type { BrokerSettings, SignalConfig } from "../core/config.js";
import {
    BrokerClosedError,
    ConfigurationError,
    SignalNotFoundError,
    SignalStateError,
} from "../core/errors.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsRecorder } from "../infrastructure/metricsCollectorInterface.js";
import { WorkerDispatcher } from "../multithreading/workerDispatcher.js";
import {
    createSampleSource,
    isTransferableSourceSpec,
    PushSampleSource,
    type SampleSource,
} from "../sources/index.js";
import type { Sample } from "../types/streamTypes.js";
import { isActive, type DispatchMode, type DispatchState, type Dispatcher } from "./dispatcher.js";
import { InlineDispatcher } from "./inlineDispatcher.js";
import type { PipelineSettings } from "./signalPipeline.js";

export interface SignalEntry {
    readonly config: SignalConfig;
    readonly broker: StreamBroker;
    readonly dispatcher: Dispatcher;
    /** Queue of the current dispatch for push sources */
    pushSource: PushSampleSource | undefined;
}

export interface SignalStatus {
    id: string;
    source: SignalConfig["source"]["kind"];
    dispatch: DispatchMode;
    state: DispatchState;
    subscribers: number;
    published: number;
    overflowDrops: number;
    pendingSamples?: number;
}

export interface PushResult {
    accepted: number;
    rejected: number;
}

export interface SignalRegistryOptions {
    broker: BrokerSettings;
    pipeline: PipelineSettings;
}

/**
 * Owns one broker and one dispatcher per configured signal.
 */
export class SignalRegistry {
    private readonly entries = new Map<string, SignalEntry>();

    constructor(
        private readonly options: SignalRegistryOptions,
        private readonly logger: ILogger,
        private readonly metrics: IMetricsRecorder
    ) {}

    public register(config: SignalConfig): SignalEntry {
        if (this.entries.has(config.id)) {
            throw new ConfigurationError(`Signal ${config.id} is already registered`);
        }

        const broker = new StreamBroker(
            { signalId: config.id, backlogCapacity: this.options.broker.backlogCapacity },
            this.logger,
            this.metrics
        );

        const createSource = (): SampleSource => {
            const source = createSampleSource(config.source);
            const registered = this.entries.get(config.id);
            if (registered) {
                registered.pushSource =
                    source instanceof PushSampleSource ? source : undefined;
            }
            return source;
        };

        const entry: SignalEntry = {
            config,
            broker,
            dispatcher: this.createDispatcher(config, broker, createSource),
            pushSource: undefined,
        };
        this.entries.set(config.id, entry);

        this.logger.info("Signal registered", {
            signalId: config.id,
            source: config.source.kind,
            dispatch: config.dispatch,
        });
        return entry;
    }

    public get(signalId: string): SignalEntry | undefined {
        return this.entries.get(signalId);
    }

    public require(signalId: string): SignalEntry {
        const entry = this.entries.get(signalId);
        if (!entry) {
            throw new SignalNotFoundError(signalId);
        }
        return entry;
    }

    public list(): SignalStatus[] {
        return [...this.entries.values()].map((entry) => {
            const stats = entry.broker.getStats();
            const status: SignalStatus = {
                id: entry.config.id,
                source: entry.config.source.kind,
                dispatch: entry.dispatcher.mode,
                state: entry.dispatcher.state,
                subscribers: stats.subscribers,
                published: stats.published,
                overflowDrops: stats.overflowDrops,
            };
            if (entry.pushSource) {
                status.pendingSamples = entry.pushSource.pending;
            }
            return status;
        });
    }

    /**
     * Start a fresh dispatch with a new source and estimator.
     */
    public start(signalId: string): void {
        const entry = this.require(signalId);
        if (entry.broker.isClosed) {
            throw new BrokerClosedError(signalId);
        }
        entry.dispatcher.start();
    }

    /**
     * Stop ingestion and end the current subscribers' streams with
     * EndOfStream. No subscriber spans two runs of a signal.
     */
    public async stop(signalId: string): Promise<void> {
        const entry = this.require(signalId);
        const wasActive = isActive(entry.dispatcher.state);
        await entry.dispatcher.stop();
        if (wasActive && !entry.broker.isClosed) {
            entry.broker.terminate("EndOfStream", `Signal ${signalId} was stopped`);
        }
    }

    /**
     * Queue samples on a running push signal. Samples past the queue's
     * capacity are refused and counted as rejected.
     */
    public pushSamples(signalId: string, samples: readonly Sample[]): PushResult {
        const entry = this.require(signalId);
        if (entry.config.source.kind !== "push") {
            throw new SignalStateError(
                `Signal ${signalId} reads from a ${entry.config.source.kind} source, not push`,
                signalId
            );
        }
        const queue = entry.pushSource;
        if (!queue || queue.isClosed || !isActive(entry.dispatcher.state)) {
            throw new SignalStateError(`Signal ${signalId} is not running`, signalId);
        }

        const accepted = queue.push(samples);
        return { accepted, rejected: samples.length - accepted };
    }

    public startAutoStart(): void {
        for (const entry of this.entries.values()) {
            if (entry.config.autoStart) {
                entry.dispatcher.start();
            }
        }
    }

    public async stopAll(): Promise<void> {
        await Promise.all(
            [...this.entries.values()].map((entry) => entry.dispatcher.stop())
        );
    }

    /**
     * Close every broker. Current subscribers receive one terminal event.
     */
    public closeAll(message = "Server is shutting down"): void {
        for (const entry of this.entries.values()) {
            entry.broker.close("Shutdown", message);
        }
    }

    public get size(): number {
        return this.entries.size;
    }

    private createDispatcher(
        config: SignalConfig,
        broker: StreamBroker,
        createSource: () => SampleSource
    ): Dispatcher {
        if (config.dispatch === "inline") {
            return new InlineDispatcher(
                config.id,
                createSource,
                broker,
                this.options.pipeline,
                this.logger,
                this.metrics
            );
        }

        if (!isTransferableSourceSpec(config.source)) {
            throw new ConfigurationError(
                `Signal ${config.id}: ${config.source.kind} sources cannot run in a worker`
            );
        }
        return new WorkerDispatcher(
            config.id,
            config.source,
            broker,
            this.options.pipeline,
            this.logger,
            this.metrics
        );
    }
}
