import { describe, it, expect } from "vitest";
import { runEstimatorWorker } from "../src/multithreading/estimatorWorkerRuntime.js";
import type { PipelineSettings } from "../src/pipeline/signalPipeline.js";
import { FakeChannel } from "../__mocks__/src/multithreading/shared/workerPort.js";

const settings: PipelineSettings = {
    estimator: { windowSize: 3, method: "backward", acceptEqualTimestamps: false },
    retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2, jitter: false },
    yieldEvery: 2,
};

describe("multithreading/runEstimatorWorker", () => {
    it("runs the pipeline and posts its output to the parent", async () => {
        const channel = new FakeChannel();

        const outcome = await runEstimatorWorker(channel, {
            signalId: "ramp",
            source: {
                kind: "synthetic",
                waveform: "ramp",
                slope: 2,
                sampleIntervalMs: 1000,
                sampleCount: 4,
                realtime: false,
            },
            settings,
            debugLogging: false,
        });

        expect(outcome).toBe("completed");
        expect(channel.ofType("point")).toEqual([
            { type: "point", x: 2, y: 2 },
            { type: "point", x: 3, y: 2 },
        ]);
        expect(channel.ofType("terminal")).toEqual([
            {
                type: "terminal",
                reason: "EndOfStream",
                message: "Source synthetic:ramp has no more samples",
            },
        ]);
        expect(channel.posted.at(-1)).toEqual({
            type: "pipeline_exit",
            outcome: "completed",
            stats: { samplesIngested: 4, pointsPublished: 2, samplesRejected: 0 },
        });
        expect(channel.ofType("metrics")).toContainEqual({
            type: "metrics",
            action: "increment",
            name: "samples_ingested_total",
            value: 1,
            labels: { signal: "ramp" },
        });
        expect(channel.ofType("log_message")[0]).toMatchObject({
            data: {
                level: "info",
                message: "Signal pipeline started",
                context: { signalId: "ramp", worker: "estimator:ramp" },
            },
        });
    });

    it("stops when the parent sends a stop message", async () => {
        const channel = new FakeChannel();

        const running = runEstimatorWorker(channel, {
            signalId: "sine",
            source: {
                kind: "synthetic",
                waveform: "sine",
                sampleIntervalMs: 60000,
                realtime: true,
            },
            settings,
            debugLogging: false,
        });
        channel.deliver({ type: "stop" });

        await expect(running).resolves.toBe("stopped");
        expect(channel.ofType("terminal")).toEqual([]);
        expect(channel.posted.at(-1)).toEqual({
            type: "pipeline_exit",
            outcome: "stopped",
            stats: { samplesIngested: 1, pointsPublished: 0, samplesRejected: 0 },
        });
    });

    it("logs messages from the parent it does not understand", async () => {
        const channel = new FakeChannel();

        const running = runEstimatorWorker(channel, {
            signalId: "sine",
            source: { kind: "synthetic", sampleIntervalMs: 60000 },
            settings,
            debugLogging: false,
        });
        channel.deliver({ type: "pause" });
        channel.deliver({ type: "stop" });
        await running;

        expect(channel.ofType("log_message")).toContainEqual({
            type: "log_message",
            data: {
                level: "warn",
                message: "Unknown message from parent",
                context: {
                    message: { type: "pause" },
                    worker: "estimator:sine",
                },
                correlationId: undefined,
            },
        });
    });

    it("reports invalid init data instead of starting", async () => {
        const channel = new FakeChannel();

        const outcome = await runEstimatorWorker(channel, {
            signalId: "pushed",
            source: { kind: "push", capacity: 4 },
            settings,
            debugLogging: false,
        });

        expect(outcome).toBeUndefined();
        expect(channel.posted).toEqual([
            {
                type: "pipeline_error",
                message: expect.stringMatching(/^Invalid worker init data: /),
            },
        ]);
    });
});
