import { describe, it, expect, beforeEach, vi } from "vitest";
import { SignalConfigSchema } from "../src/core/config.js";
import { SignalController } from "../src/core/signalController.js";
import { EventStreamEndpoint } from "../src/endpoint/eventStreamEndpoint.js";
import { MetricsCollector } from "../src/infrastructure/metricsCollector.js";
import { SignalRegistry } from "../src/pipeline/signalRegistry.js";
import { createMockLogger } from "../__mocks__/src/infrastructure/loggerInterface.js";

describe("core/SignalController", () => {
    let metrics: MetricsCollector;
    let registry: SignalRegistry;
    let controller: SignalController;

    beforeEach(() => {
        const logger = createMockLogger();
        metrics = new MetricsCollector();
        registry = new SignalRegistry(
            {
                broker: { backlogCapacity: 8 },
                pipeline: {
                    estimator: { windowSize: 3, method: "backward", acceptEqualTimestamps: false },
                    retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2, jitter: false },
                    yieldEvery: 16,
                },
            },
            logger,
            metrics
        );
        registry.register(
            SignalConfigSchema.parse({ id: "ingest", source: { kind: "push", capacity: 2 } })
        );
        registry.register(
            SignalConfigSchema.parse({
                id: "sine",
                autoStart: false,
                source: { kind: "synthetic", sampleIntervalMs: 60000 },
            })
        );
        const endpoint = new EventStreamEndpoint(
            { heartbeatIntervalMs: 0, retryHintMs: 3000, shutdownGraceMs: 0 },
            logger,
            metrics
        );
        controller = new SignalController(registry, endpoint, metrics);
    });

    it("lists every registered signal", () => {
        const result = controller.listSignals();

        expect(result.status).toBe(200);
        expect(result.body).toEqual({
            signals: [
                {
                    id: "ingest",
                    source: "push",
                    dispatch: "inline",
                    state: "idle",
                    subscribers: 0,
                    published: 0,
                    overflowDrops: 0,
                },
                {
                    id: "sine",
                    source: "synthetic",
                    dispatch: "inline",
                    state: "idle",
                    subscribers: 0,
                    published: 0,
                    overflowDrops: 0,
                },
            ],
        });
    });

    it("streams from known signals that have not ended", () => {
        const target = controller.streamTarget("sine");

        expect(target).toEqual({ ok: true, broker: registry.require("sine").broker });
        expect(controller.streamTarget("missing")).toEqual({
            ok: false,
            result: { status: 404, body: { status: "error", error: "Unknown signal: missing" } },
        });
    });

    it("refuses to stream a signal whose run has completed", async () => {
        registry.register(
            SignalConfigSchema.parse({
                id: "ramp",
                autoStart: false,
                source: { kind: "synthetic", waveform: "ramp", sampleCount: 3, realtime: false },
            })
        );
        registry.start("ramp");
        await vi.waitFor(() => expect(registry.require("ramp").dispatcher.state).toBe("completed"));

        expect(controller.streamTarget("ramp")).toEqual({
            ok: false,
            result: {
                status: 409,
                body: {
                    status: "error",
                    error: "Signal ramp has completed; start it again before streaming",
                },
            },
        });
    });

    it("starts and stops a signal", async () => {
        const started = controller.startSignal("ingest");
        expect(started.status).toBe(202);
        expect(started.body).toMatchObject({ id: "ingest", state: "running" });

        expect(controller.startSignal("ingest")).toEqual({
            status: 409,
            body: { status: "error", error: "Signal ingest is already running" },
        });

        const stopped = await controller.stopSignal("ingest");
        expect(stopped.status).toBe(200);
        expect(stopped.body).toMatchObject({ id: "ingest", state: "stopped" });
    });

    it("answers 404 for unknown signals", async () => {
        const notFound = {
            status: 404,
            body: { status: "error", error: "Unknown signal: nope" },
        };

        expect(controller.startSignal("nope")).toEqual(notFound);
        expect(await controller.stopSignal("nope")).toEqual(notFound);
        expect(controller.pushSamples("nope", { samples: [{ timestamp: 0, value: 0 }] })).toEqual(
            notFound
        );
    });

    it("validates pushed sample batches", () => {
        expect(controller.pushSamples("ingest", { samples: [] })).toEqual({
            status: 400,
            body: {
                status: "error",
                error: "Invalid sample batch",
                issues: ["samples: Array must contain at least 1 element(s)"],
            },
        });
        expect(
            controller.pushSamples("ingest", { samples: [{ timestamp: "soon", value: 1 }] })
        ).toEqual({
            status: 400,
            body: {
                status: "error",
                error: "Invalid sample batch",
                issues: ["samples.0.timestamp: Expected number, received string"],
            },
        });
    });

    it("accepts samples on a running push signal and reports overflow", async () => {
        controller.startSignal("ingest");

        expect(
            controller.pushSamples("ingest", {
                samples: [
                    { timestamp: 0, value: 0 },
                    { timestamp: 1, value: 1 },
                    { timestamp: 2, value: 2 },
                    { timestamp: 3, value: 3 },
                ],
            })
        ).toEqual({ status: 429, body: { accepted: 3, rejected: 1 } });

        await controller.stopSignal("ingest");
    });

    it("answers 409 for pushes the signal cannot take", () => {
        expect(controller.pushSamples("ingest", { samples: [{ timestamp: 0, value: 0 }] })).toEqual({
            status: 409,
            body: { status: "error", error: "Signal ingest is not running" },
        });
        expect(controller.pushSamples("sine", { samples: [{ timestamp: 0, value: 0 }] })).toEqual({
            status: 409,
            body: { status: "error", error: "Signal sine reads from a synthetic source, not push" },
        });

        registry.closeAll();
        expect(controller.startSignal("sine")).toEqual({
            status: 409,
            body: { status: "error", error: "Broker for signal sine is closed" },
        });
    });

    it("reports health and metrics", () => {
        metrics.incrementCounter("source_unavailable_total", 1, { signal: "sine" });

        expect(controller.health()).toEqual({
            status: 200,
            body: {
                status: "degraded",
                uptimeMs: expect.any(Number),
                activeSessions: 0,
                sourceFailures: 1,
                overflowDrops: 0,
                signals: 2,
                sessions: 0,
            },
        });
        expect(controller.metrics()).toEqual({
            status: 200,
            body: 'source_unavailable_total{signal="sine"} 1\n',
            contentType: "text/plain; version=0.0.4; charset=utf-8",
        });
        expect(controller.stats("req-7").body).toMatchObject({
            correlationId: "req-7",
            health: { status: "degraded" },
        });
    });
});
