// src/sources/pushSampleSource.ts

import type { Sample } from "../types/streamTypes.js";
import { CircularBuffer } from "../utils/circularBuffer.js";
import type { SampleSource } from "./sampleSource.js";

/**
 * Bounded queue fed from outside (the HTTP ingest route). Unlike the broker
 * backlog, a full queue refuses new samples and keeps the old ones.
 */
export class PushSampleSource implements SampleSource {
    public readonly name = "push";
    private readonly queue: CircularBuffer<Sample>;
    private waiter: ((sample: Sample | undefined) => void) | undefined;
    private closed = false;

    constructor(capacity: number) {
        this.queue = new CircularBuffer<Sample>(capacity);
    }

    /**
     * Returns how many of the given samples were queued, stopping at the
     * first one that does not fit.
     */
    public push(samples: readonly Sample[]): number {
        let accepted = 0;
        for (const sample of samples) {
            if (this.closed) break;
            if (this.waiter) {
                const waiter = this.waiter;
                this.waiter = undefined;
                waiter(sample);
            } else if (this.queue.isFull) {
                break;
            } else {
                this.queue.push(sample);
            }
            accepted++;
        }
        return accepted;
    }

    public next(): Promise<Sample | undefined> {
        const queued = this.queue.shift();
        if (queued !== undefined || this.closed) {
            return Promise.resolve(queued);
        }
        if (this.waiter) {
            return Promise.reject(new Error("PushSampleSource already has a pending read"));
        }
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }

    public async close(): Promise<void> {
        this.closed = true;
        this.queue.clear();
        const waiter = this.waiter;
        this.waiter = undefined;
        waiter?.(undefined);
    }

    public get pending(): number {
        return this.queue.length;
    }

    public get isClosed(): boolean {
        return this.closed;
    }
}
