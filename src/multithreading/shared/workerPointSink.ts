// src/multithreading/shared/workerPointSink.ts
import type {
    DerivativePoint,
    PointSink,
    TerminalReason,
} from "../../types/streamTypes.js";
import type { WorkerPort } from "./workerPort.js";

/**
 * Stands in for the broker inside a worker. The parent replays each
 * message onto the real broker in arrival order.
 */
export class WorkerPointSink implements PointSink {
    private terminated = false;

    constructor(private readonly port: WorkerPort) {}

    public publish(point: DerivativePoint): void {
        if (this.terminated) return;
        this.port.postMessage({ type: "point", x: point.x, y: point.y });
    }

    public terminate(reason: TerminalReason, message: string): void {
        if (this.terminated) return;
        this.terminated = true;
        this.port.postMessage({ type: "terminal", reason, message });
    }
}
