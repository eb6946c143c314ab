// __mocks__/src/multithreading/shared/workerPort.ts
import type { WorkerChannel } from "../../../../src/multithreading/shared/workerPort.js";

/**
 * In-process stand-in for a worker's parent port. Posted messages are
 * recorded; `deliver` plays a message from the parent.
 */
export class FakeChannel implements WorkerChannel {
    public readonly posted: unknown[] = [];
    public closed = false;
    private readonly listeners: Array<(message: unknown) => void> = [];

    public postMessage(value: unknown): void {
        this.posted.push(value);
    }

    public on(_event: "message", listener: (message: unknown) => void): this {
        this.listeners.push(listener);
        return this;
    }

    public close(): void {
        this.closed = true;
    }

    public deliver(message: unknown): void {
        for (const listener of this.listeners) {
            listener(message);
        }
    }

    /**
     * Posted messages of one type, in order
     */
    public ofType(type: string): unknown[] {
        return this.posted.filter(
            (message) =>
                typeof message === "object" &&
                message !== null &&
                "type" in message &&
                message.type === type
        );
    }
}
