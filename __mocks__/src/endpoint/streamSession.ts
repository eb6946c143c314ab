// __mocks__/src/endpoint/streamSession.ts
import { EventEmitter } from "events";
import type { SseTransport } from "../../../src/endpoint/streamSession.js";

/**
 * In-memory SSE transport. `accepting = false` simulates a full socket
 * buffer until "drain" is emitted.
 */
export class FakeTransport extends EventEmitter implements SseTransport {
    public readonly chunks: string[] = [];
    public writableEnded = false;
    public accepting = true;
    public failWith: Error | undefined;

    public write(chunk: string): boolean {
        if (this.failWith) throw this.failWith;
        this.chunks.push(chunk);
        return this.accepting;
    }

    public end(): void {
        this.writableEnded = true;
        this.emit("close");
    }
}
