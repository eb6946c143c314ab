// src/endpoint/streamSession.ts

import type { StreamBroker } from "../broker/streamBroker.js";
import type { Subscription } from "../broker/subscription.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsRecorder } from "../infrastructure/metricsCollectorInterface.js";
import type { StreamEvent } from "../types/streamTypes.js";
import { formatSseEvent, KEEPALIVE_COMMENT } from "./sseFormat.js";

export type SessionState = "connecting" | "active" | "draining" | "closed";

export type SessionCloseReason =
    | "client_disconnected"
    | "send_failed"
    | "terminal_event"
    | "shutdown"
    | "subscription_ended";

/**
 * The writable side of an SSE response. Express responses satisfy this.
 */
export interface SseTransport {
    write(chunk: string): boolean;
    end(): void;
    once(event: "drain" | "close", listener: () => void): unknown;
    removeListener(event: "drain" | "close", listener: () => void): unknown;
    readonly writableEnded: boolean;
}

export interface StreamSessionOptions {
    heartbeatIntervalMs: number;
}

class TransportClosedError extends Error {
    constructor() {
        super("Transport closed before write completed");
        this.name = "TransportClosedError";
    }
}

/**
 * One connected client. Owns its broker subscription and runs a single
 * writer loop that forwards events in publish order.
 */
export class StreamSession {
    private state: SessionState = "connecting";
    private lastSeq = 0;
    private sent = 0;
    private heartbeat: NodeJS.Timeout | undefined;
    private closeReason: SessionCloseReason | undefined;
    private readonly subscription: Subscription;
    private loop: Promise<void> | undefined;

    constructor(
        public readonly id: string,
        private readonly broker: StreamBroker,
        private readonly transport: SseTransport,
        private readonly options: StreamSessionOptions,
        private readonly logger: ILogger,
        private readonly metrics: IMetricsRecorder,
        private readonly onClosed: (session: StreamSession) => void
    ) {
        this.subscription = broker.subscribe();
    }

    /**
     * Start the delivery loop. The returned promise settles once the
     * session has been released.
     */
    public run(): Promise<void> {
        if (!this.loop) {
            this.state = "active";
            this.startHeartbeat();
            this.loop = this.deliver();
        }
        return this.loop;
    }

    /**
     * Keep delivering what is already queued, then stop. Used on shutdown
     * after the broker has queued its terminal event.
     */
    public drain(): void {
        if (this.state === "active") this.state = "draining";
    }

    public close(reason: SessionCloseReason): void {
        if (this.state === "closed") return;
        this.state = "closed";
        this.closeReason = reason;
        this.stopHeartbeat();
        this.broker.unsubscribe(this.subscription);

        if (!this.transport.writableEnded) {
            this.transport.end();
        }

        this.logger.info("Stream session closed", {
            sessionId: this.id,
            signalId: this.broker.signalId,
            reason,
            sent: this.sent,
            lastSeq: this.lastSeq,
            overflowDrops: this.subscription.overflowCount,
        });
        this.onClosed(this);
    }

    public get currentState(): SessionState {
        return this.state;
    }

    public get lastDeliveredSeq(): number {
        return this.lastSeq;
    }

    public get sentCount(): number {
        return this.sent;
    }

    public get overflowCount(): number {
        return this.subscription.overflowCount;
    }

    public get reason(): SessionCloseReason | undefined {
        return this.closeReason;
    }

    private async deliver(): Promise<void> {
        let endReason: SessionCloseReason = "subscription_ended";
        try {
            while (this.state === "active" || this.state === "draining") {
                const event = await this.subscription.next();
                if (event === undefined || this.currentState === "closed") break;

                await this.send(event);
                if (event.type === "terminal") {
                    endReason = "terminal_event";
                    break;
                }
            }
        } catch (error) {
            endReason = "send_failed";
            if (!(error instanceof TransportClosedError)) {
                this.metrics.incrementCounter("session_send_failures_total", 1, {
                    signal: this.broker.signalId,
                });
                this.logger.warn("Stream session send failed", {
                    sessionId: this.id,
                    signalId: this.broker.signalId,
                    error,
                });
            }
        } finally {
            this.close(endReason);
        }
    }

    private async send(event: StreamEvent): Promise<void> {
        await this.write(formatSseEvent(event));
        this.sent++;
        if (event.type === "point") this.lastSeq = event.seq;
    }

    private async write(chunk: string): Promise<void> {
        if (this.transport.writableEnded) throw new TransportClosedError();
        if (this.transport.write(chunk)) return;

        // Kernel buffer is full: wait until the socket drains or goes away
        await new Promise<void>((resolve, reject) => {
            const onDrain = (): void => {
                this.transport.removeListener("close", onClose);
                resolve();
            };
            const onClose = (): void => {
                this.transport.removeListener("drain", onDrain);
                reject(new TransportClosedError());
            };
            this.transport.once("drain", onDrain);
            this.transport.once("close", onClose);
        });
    }

    private startHeartbeat(): void {
        if (this.options.heartbeatIntervalMs <= 0) return;
        this.heartbeat = setInterval(() => {
            if (this.state === "closed" || this.transport.writableEnded) return;
            this.transport.write(KEEPALIVE_COMMENT);
        }, this.options.heartbeatIntervalMs);
        this.heartbeat.unref();
    }

    private stopHeartbeat(): void {
        if (this.heartbeat) {
            clearInterval(this.heartbeat);
            this.heartbeat = undefined;
        }
    }
}
