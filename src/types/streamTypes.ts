// src/types/streamTypes.ts

/**
 * One raw measurement from a source signal.
 */
export interface Sample {
    readonly timestamp: number;
    readonly value: number;
}

/**
 * One derivative estimate. `x` is the timestamp of the sample that produced it.
 */
export interface DerivativePoint {
    readonly x: number;
    readonly y: number;
}

export type TerminalReason = "SourceUnavailable" | "EndOfStream" | "Shutdown";

export interface PointEvent {
    type: "point";
    seq: number;
    point: DerivativePoint;
}

export interface TerminalEvent {
    type: "terminal";
    reason: TerminalReason;
    message: string;
    timestamp: number;
}

export type StreamEvent = PointEvent | TerminalEvent;

/**
 * Where a pipeline hands its output. The broker is the main-thread sink,
 * workers use a sink that posts to the parent thread.
 */
export interface PointSink {
    publish(point: DerivativePoint): void;
    terminate(reason: TerminalReason, message: string): void;
}
