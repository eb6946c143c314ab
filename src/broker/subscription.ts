// src/broker/subscription.ts

import { CircularBuffer } from "../utils/circularBuffer.js";
import type {
    PointEvent,
    StreamEvent,
    TerminalEvent,
} from "../types/streamTypes.js";

export interface SubscriptionHandle {
    readonly id: string;
}

/**
 * One subscriber's bounded backlog. The broker writes, a single delivery
 * loop reads through `next()`.
 */
export class Subscription implements SubscriptionHandle {
    private readonly backlog: CircularBuffer<PointEvent>;
    private terminal: TerminalEvent | undefined;
    private terminalDelivered = false;
    private closed = false;
    private waiter: ((event: StreamEvent | undefined) => void) | undefined;
    private overflowDrops = 0;
    private deliveredCount = 0;

    constructor(
        public readonly id: string,
        capacity: number
    ) {
        this.backlog = new CircularBuffer<PointEvent>(capacity);
    }

    /**
     * Resolves with the next event in publish order, or `undefined` once the
     * subscription is closed or its terminal event has been handed out.
     */
    public next(): Promise<StreamEvent | undefined> {
        if (this.waiter) {
            return Promise.reject(
                new Error(`Subscription ${this.id} already has a pending read`)
            );
        }
        const event = this.take();
        if (event !== undefined || this.isFinished) {
            return Promise.resolve(event);
        }
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }

    /**
     * Returns true when the oldest buffered point had to be dropped.
     */
    public enqueue(event: PointEvent): boolean {
        if (this.closed || this.terminal) return false;
        const evicted = this.backlog.push(event);
        if (evicted !== undefined) this.overflowDrops++;
        this.wake();
        return evicted !== undefined;
    }

    /**
     * Queue the terminal event behind whatever is still buffered. Only the
     * first terminal event counts.
     */
    public finish(event: TerminalEvent): void {
        if (this.closed || this.terminal) return;
        this.terminal = event;
        this.wake();
    }

    /**
     * Discard the backlog and release a pending reader.
     */
    public close(): void {
        if (this.closed) return;
        this.closed = true;
        this.backlog.clear();
        const waiter = this.waiter;
        this.waiter = undefined;
        waiter?.(undefined);
    }

    public get pending(): number {
        return this.backlog.length;
    }

    public get overflowCount(): number {
        return this.overflowDrops;
    }

    public get delivered(): number {
        return this.deliveredCount;
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    public get isTerminated(): boolean {
        return this.terminal !== undefined;
    }

    private get isFinished(): boolean {
        return this.closed || this.terminalDelivered;
    }

    private take(): StreamEvent | undefined {
        if (this.closed) return undefined;
        const point = this.backlog.shift();
        if (point !== undefined) {
            this.deliveredCount++;
            return point;
        }
        if (this.terminal && !this.terminalDelivered) {
            this.terminalDelivered = true;
            return this.terminal;
        }
        return undefined;
    }

    private wake(): void {
        if (!this.waiter) return;
        const event = this.take();
        if (event === undefined && !this.isFinished) return;
        const waiter = this.waiter;
        this.waiter = undefined;
        waiter(event);
    }
}
