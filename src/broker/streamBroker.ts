// src/broker/streamBroker.ts

import { randomUUID } from "crypto";
import { BrokerClosedError } from "../core/errors.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsRecorder } from "../infrastructure/metricsCollectorInterface.js";
import type {
    DerivativePoint,
    PointSink,
    TerminalEvent,
    TerminalReason,
} from "../types/streamTypes.js";
import { Subscription, type SubscriptionHandle } from "./subscription.js";

export interface StreamBrokerOptions {
    signalId: string;
    backlogCapacity: number;
}

export interface BrokerStats {
    signalId: string;
    subscribers: number;
    published: number;
    overflowDrops: number;
    closed: boolean;
}

/**
 * Per-signal fan-out hub.
 *
 * Every registered subscription gets each published point appended to its
 * own bounded backlog. A full backlog loses its oldest point, so a slow
 * reader never holds up `publish`. All calls arrive on the main event loop
 * (worker output is relayed as messages), which keeps registry and backlog
 * mutations serialized.
 */
export class StreamBroker implements PointSink {
    private readonly subscriptions = new Map<string, Subscription>();
    private sequence = 0;
    private overflowDrops = 0;
    private closed = false;

    constructor(
        private readonly options: StreamBrokerOptions,
        private readonly logger: ILogger,
        private readonly metrics: IMetricsRecorder
    ) {
        if (!Number.isInteger(options.backlogCapacity) || options.backlogCapacity < 1) {
            throw new RangeError(
                `backlogCapacity must be a positive integer, got ${options.backlogCapacity}`
            );
        }
    }

    public publish(point: DerivativePoint): void {
        if (this.closed) {
            this.logger.debug("Dropping point published to closed broker", {
                signalId: this.options.signalId,
                x: point.x,
            });
            return;
        }

        const event = { type: "point" as const, seq: ++this.sequence, point };
        let dropped = 0;
        for (const subscription of this.subscriptions.values()) {
            if (subscription.enqueue(event)) dropped++;
        }

        this.metrics.incrementCounter("points_published_total", 1, {
            signal: this.options.signalId,
        });
        if (dropped > 0) {
            this.overflowDrops += dropped;
            this.metrics.incrementCounter("broker_overflow_drops_total", dropped, {
                signal: this.options.signalId,
            });
        }
    }

    public subscribe(): Subscription {
        if (this.closed) {
            throw new BrokerClosedError(this.options.signalId);
        }
        const subscription = new Subscription(
            randomUUID(),
            this.options.backlogCapacity
        );
        this.subscriptions.set(subscription.id, subscription);
        this.logger.debug("Subscriber registered", {
            signalId: this.options.signalId,
            subscriptionId: subscription.id,
            subscribers: this.subscriptions.size,
        });
        return subscription;
    }

    /**
     * Idempotent: unknown or already removed handles are ignored.
     */
    public unsubscribe(handle: SubscriptionHandle): void {
        const subscription = this.subscriptions.get(handle.id);
        if (handle instanceof Subscription) {
            handle.close();
        }
        if (!subscription) return;

        subscription.close();
        this.subscriptions.delete(handle.id);
        this.logger.debug("Subscriber removed", {
            signalId: this.options.signalId,
            subscriptionId: handle.id,
            subscribers: this.subscriptions.size,
        });
    }

    /**
     * End delivery for every current subscriber with one terminal event.
     * They are detached here; subscribers that join later start clean.
     */
    public terminate(reason: TerminalReason, message: string): void {
        const event: TerminalEvent = {
            type: "terminal",
            reason,
            message,
            timestamp: Date.now(),
        };
        const count = this.subscriptions.size;
        for (const subscription of this.subscriptions.values()) {
            subscription.finish(event);
        }
        this.subscriptions.clear();

        this.logger.info("Stream terminated for subscribers", {
            signalId: this.options.signalId,
            reason,
            subscribers: count,
        });
    }

    /**
     * Terminate current subscribers and refuse new ones.
     */
    public close(reason: TerminalReason = "Shutdown", message = "Server is shutting down"): void {
        if (this.closed) return;
        this.terminate(reason, message);
        this.closed = true;
    }

    public getOverflowCount(): number {
        return this.overflowDrops;
    }

    public getSubscriberCount(): number {
        return this.subscriptions.size;
    }

    public get signalId(): string {
        return this.options.signalId;
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    public getStats(): BrokerStats {
        return {
            signalId: this.options.signalId,
            subscribers: this.subscriptions.size,
            published: this.sequence,
            overflowDrops: this.overflowDrops,
            closed: this.closed,
        };
    }
}
