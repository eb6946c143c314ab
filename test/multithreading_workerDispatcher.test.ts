import { describe, it, expect, beforeEach, vi } from "vitest";

const { FakeWorker } = vi.hoisted(() => {
    type Listener = (...args: unknown[]) => void;

    class FakeWorker {
        static instances: FakeWorker[] = [];
        public readonly threadId: number;
        public readonly posted: unknown[] = [];
        public terminated = false;
        private readonly listeners = new Map<
            string,
            Array<{ listener: Listener; once: boolean }>
        >();

        constructor(
            public readonly url: URL,
            public readonly options: { workerData?: unknown }
        ) {
            FakeWorker.instances.push(this);
            this.threadId = FakeWorker.instances.length;
        }

        on(event: string, listener: Listener): this {
            return this.add(event, listener, false);
        }

        once(event: string, listener: Listener): this {
            return this.add(event, listener, true);
        }

        emit(event: string, ...args: unknown[]): void {
            const registered = this.listeners.get(event) ?? [];
            this.listeners.set(
                event,
                registered.filter((entry) => !entry.once)
            );
            for (const entry of registered) {
                entry.listener(...args);
            }
        }

        postMessage(value: unknown): void {
            this.posted.push(value);
        }

        terminate(): Promise<number> {
            this.terminated = true;
            this.emit("exit", 1);
            return Promise.resolve(1);
        }

        private add(event: string, listener: Listener, once: boolean): this {
            const registered = this.listeners.get(event) ?? [];
            registered.push({ listener, once });
            this.listeners.set(event, registered);
            return this;
        }
    }

    return { FakeWorker };
});

vi.mock("worker_threads", () => ({ Worker: FakeWorker }));

import { StreamBroker } from "../src/broker/streamBroker.js";
import type { ILogger } from "../src/infrastructure/loggerInterface.js";
import { MetricsCollector } from "../src/infrastructure/metricsCollector.js";
import { WorkerDispatcher } from "../src/multithreading/workerDispatcher.js";
import { DispatchInProgressError } from "../src/pipeline/dispatcher.js";
import type { PipelineSettings } from "../src/pipeline/signalPipeline.js";
import { SyntheticSourceSchema } from "../src/sources/sampleSource.js";
import { createMockLogger } from "../__mocks__/src/infrastructure/loggerInterface.js";

const settings: PipelineSettings = {
    estimator: { windowSize: 3, method: "backward", acceptEqualTimestamps: false },
    retry: { maxRetries: 1, baseDelayMs: 10, maxDelayMs: 10, backoffMultiplier: 2, jitter: false },
    yieldEvery: 8,
};

const source = SyntheticSourceSchema.parse({ kind: "synthetic", waveform: "ramp" });

function currentWorker(): InstanceType<typeof FakeWorker> {
    const worker = FakeWorker.instances.at(-1);
    if (!worker) throw new Error("No worker was started");
    return worker;
}

describe("multithreading/WorkerDispatcher", () => {
    let logger: ILogger;
    let metrics: MetricsCollector;
    let broker: StreamBroker;
    let dispatcher: WorkerDispatcher;

    beforeEach(() => {
        FakeWorker.instances = [];
        logger = createMockLogger();
        metrics = new MetricsCollector();
        broker = new StreamBroker({ signalId: "sig", backlogCapacity: 8 }, logger, metrics);
        dispatcher = new WorkerDispatcher("sig", source, broker, settings, logger, metrics, {
            workerUrl: new URL("file:///workers/estimatorWorker.js"),
            stopTimeoutMs: 100,
        });
    });

    it("starts a worker with the signal's init data", () => {
        expect(dispatcher.mode).toBe("worker");
        expect(dispatcher.state).toBe("idle");

        dispatcher.start();

        const worker = currentWorker();
        expect(worker.url.href).toBe("file:///workers/estimatorWorker.js");
        expect(worker.options.workerData).toEqual({
            signalId: "sig",
            source,
            settings,
            debugLogging: false,
        });
        expect(dispatcher.state).toBe("running");
        expect(() => dispatcher.start()).toThrow(DispatchInProgressError);
        expect(FakeWorker.instances).toHaveLength(1);
    });

    it("relays points and the terminal event to the broker in order", async () => {
        const subscription = broker.subscribe();
        dispatcher.start();
        const worker = currentWorker();

        worker.emit("message", { type: "point", x: 1, y: 2 });
        worker.emit("message", { type: "point", x: 2, y: 2.5 });
        worker.emit("message", {
            type: "terminal",
            reason: "EndOfStream",
            message: "Source synthetic:ramp has no more samples",
        });
        worker.emit("message", {
            type: "pipeline_exit",
            outcome: "completed",
            stats: { samplesIngested: 4, pointsPublished: 2, samplesRejected: 0 },
        });
        worker.emit("exit", 0);

        expect(await subscription.next()).toEqual({ type: "point", seq: 1, point: { x: 1, y: 2 } });
        expect(await subscription.next()).toEqual({ type: "point", seq: 2, point: { x: 2, y: 2.5 } });
        expect(await subscription.next()).toMatchObject({
            type: "terminal",
            reason: "EndOfStream",
            message: "Source synthetic:ramp has no more samples",
        });
        expect(dispatcher.state).toBe("completed");
        expect(dispatcher.getLastStats()).toEqual({
            samplesIngested: 4,
            pointsPublished: 2,
            samplesRejected: 0,
        });
    });

    it("forwards worker logs and metrics", () => {
        dispatcher.start();
        const worker = currentWorker();

        worker.emit("message", {
            type: "log_message",
            data: {
                level: "warn",
                message: "acquire_sample failed, retrying",
                context: { attempt: 1 },
                correlationId: "corr-1",
            },
        });
        worker.emit("message", {
            type: "metrics",
            action: "increment",
            name: "samples_ingested_total",
            value: 3,
            labels: { signal: "sig" },
        });
        worker.emit("message", {
            type: "metrics",
            action: "gauge",
            name: "window_fill",
            value: 0.5,
        });

        expect(logger.warn).toHaveBeenCalledWith(
            "acquire_sample failed, retrying",
            { attempt: 1 },
            "corr-1"
        );
        expect(metrics.getCounter("samples_ingested_total", { signal: "sig" })).toBe(3);
        expect(metrics.getGauge("window_fill")).toBe(0.5);
    });

    it("drops messages that fail validation", () => {
        dispatcher.start();

        currentWorker().emit("message", { type: "point", x: "1", y: 2 });

        expect(broker.getStats().published).toBe(0);
        expect(logger.warn).toHaveBeenCalledWith(
            "Invalid message from estimator worker",
            expect.objectContaining({ signalId: "sig" })
        );
    });

    it("fails the dispatch once when the worker dies", async () => {
        const subscription = broker.subscribe();
        dispatcher.start();
        const worker = currentWorker();

        worker.emit("message", { type: "pipeline_error", message: "boom" });
        worker.emit("error", new Error("thread crashed"));
        worker.emit("exit", 1);

        expect(dispatcher.state).toBe("failed");
        expect(await subscription.next()).toMatchObject({
            type: "terminal",
            reason: "SourceUnavailable",
            message: "Estimator worker crashed: boom",
        });
        expect(await subscription.next()).toBeUndefined();
        expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it("treats an exit without an outcome as a failure", async () => {
        const subscription = broker.subscribe();
        dispatcher.start();

        currentWorker().emit("exit", 3);

        expect(dispatcher.state).toBe("failed");
        expect(await subscription.next()).toMatchObject({
            reason: "SourceUnavailable",
            message: "Estimator worker exited with code 3",
        });
    });

    it("asks the worker to stop and waits for it to exit", async () => {
        const subscription = broker.subscribe();
        dispatcher.start();
        const worker = currentWorker();

        const stopping = dispatcher.stop();
        expect(dispatcher.state).toBe("stopping");
        expect(worker.posted).toEqual([{ type: "stop" }]);

        worker.emit("message", {
            type: "pipeline_exit",
            outcome: "stopped",
            stats: { samplesIngested: 1, pointsPublished: 0, samplesRejected: 0 },
        });
        worker.emit("exit", 0);
        await stopping;

        expect(dispatcher.state).toBe("stopped");
        expect(worker.terminated).toBe(false);
        expect(subscription.isTerminated).toBe(false);
    });

    it("terminates a worker that ignores the stop request", async () => {
        vi.useFakeTimers();
        dispatcher.start();
        const worker = currentWorker();

        const stopping = dispatcher.stop();
        await vi.advanceTimersByTimeAsync(100);
        await stopping;

        expect(worker.terminated).toBe(true);
        expect(dispatcher.state).toBe("stopped");
        expect(logger.warn).toHaveBeenCalledWith(
            "Estimator worker did not exit, terminating",
            { signalId: "sig", timeoutMs: 100 }
        );
    });

    it("ignores output from a previous worker after a restart", () => {
        dispatcher.start();
        const first = currentWorker();
        first.emit("message", {
            type: "pipeline_exit",
            outcome: "completed",
            stats: { samplesIngested: 0, pointsPublished: 0, samplesRejected: 0 },
        });

        dispatcher.start();
        first.emit("message", { type: "point", x: 1, y: 1 });
        first.emit("exit", 1);

        expect(FakeWorker.instances).toHaveLength(2);
        expect(broker.getStats().published).toBe(0);
        expect(dispatcher.state).toBe("running");
    });
});
