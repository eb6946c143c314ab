// src/endpoint/eventStreamEndpoint.ts

import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import type { StreamBroker } from "../broker/streamBroker.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsRecorder } from "../infrastructure/metricsCollectorInterface.js";
import { ProductionUtils } from "../utils/productionUtils.js";
import { formatRetryHint } from "./sseFormat.js";
import { StreamSession, type SseTransport } from "./streamSession.js";

export interface EventStreamEndpointOptions {
    heartbeatIntervalMs: number;
    retryHintMs: number;
    shutdownGraceMs: number;
}

/**
 * Server-to-client push channel. Each connection gets a StreamSession that
 * is subscribed to the signal's broker for exactly as long as it lives.
 * A reconnecting client starts over with an empty backlog.
 */
export class EventStreamEndpoint {
    private readonly sessions = new Map<string, StreamSession>();
    private readonly loops = new Map<string, Promise<void>>();
    private isShuttingDown = false;

    constructor(
        private readonly options: EventStreamEndpointOptions,
        private readonly logger: ILogger,
        private readonly metrics: IMetricsRecorder
    ) {}

    /**
     * Express handler body for an SSE route
     */
    public handleRequest(broker: StreamBroker, req: Request, res: Response): void {
        if (this.isShuttingDown || broker.isClosed) {
            res.status(503).json({
                status: "unavailable",
                error: "Stream is shutting down",
            });
            return;
        }

        res.status(200);
        res.setHeader("Content-Type", "text/event-stream");
        res.setHeader("Cache-Control", "no-cache");
        res.setHeader("Connection", "keep-alive");
        res.setHeader("X-Accel-Buffering", "no");
        res.flushHeaders();
        res.write(formatRetryHint(this.options.retryHintMs));

        const session = this.openSession(broker, res);
        req.on("close", () => {
            session.close("client_disconnected");
        });
    }

    /**
     * Create, register and start a session over an already prepared transport
     */
    public openSession(broker: StreamBroker, transport: SseTransport): StreamSession {
        const session = new StreamSession(
            randomUUID(),
            broker,
            transport,
            { heartbeatIntervalMs: this.options.heartbeatIntervalMs },
            this.logger,
            this.metrics,
            (closed) => this.release(closed)
        );
        this.sessions.set(session.id, session);
        this.updateGauge();

        this.logger.info("Stream session opened", {
            sessionId: session.id,
            signalId: broker.signalId,
            activeSessions: this.sessions.size,
        });

        // run() never rejects; the session closes itself when delivery ends
        this.loops.set(session.id, session.run());
        return session;
    }

    /**
     * Let sessions flush what their brokers already queued (the caller closes
     * brokers first), then force-close whatever is left after the grace period.
     */
    public async shutdown(): Promise<void> {
        this.isShuttingDown = true;
        for (const session of this.sessions.values()) {
            session.drain();
        }

        const pending = [...this.loops.values()];
        if (pending.length > 0) {
            const controller = new AbortController();
            await Promise.race([
                Promise.all(pending),
                ProductionUtils.sleep(
                    this.options.shutdownGraceMs,
                    controller.signal
                ).catch((error: unknown) => {
                    if (!ProductionUtils.isAbortError(error)) throw error;
                }),
            ]);
            controller.abort();
        }

        for (const session of [...this.sessions.values()]) {
            session.close("shutdown");
        }
        this.logger.info("Event stream endpoint stopped", {
            drainedSessions: pending.length,
        });
    }

    public getSessionCount(): number {
        return this.sessions.size;
    }

    public getSession(id: string): StreamSession | undefined {
        return this.sessions.get(id);
    }

    private release(session: StreamSession): void {
        this.sessions.delete(session.id);
        this.loops.delete(session.id);
        this.updateGauge();
    }

    private updateGauge(): void {
        this.metrics.setGauge("sessions_active", this.sessions.size);
    }
}
