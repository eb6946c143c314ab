// src/core/errors.ts

import type { Sample } from "../types/streamTypes.js";

/**
 * Custom error types for the derivative stream pipeline
 */

export type SampleRejectionReason =
    | "OutOfOrderSample"
    | "DegenerateInterval"
    | "InvalidSample";

/**
 * Base class for per-sample errors. These never stop a pipeline.
 */
export abstract class SampleRejectedError extends Error {
    public abstract readonly reason: SampleRejectionReason;

    constructor(
        message: string,
        public readonly sample: Sample
    ) {
        super(message);
    }
}

export class OutOfOrderSampleError extends SampleRejectedError {
    public readonly reason = "OutOfOrderSample";

    constructor(
        sample: Sample,
        public readonly lastTimestamp: number
    ) {
        super(
            `Sample at t=${sample.timestamp} does not follow last accepted t=${lastTimestamp}`,
            sample
        );
        this.name = "OutOfOrderSampleError";
    }
}

export class DegenerateIntervalError extends SampleRejectedError {
    public readonly reason = "DegenerateInterval";

    constructor(sample: Sample, detail: string) {
        super(
            `Degenerate interval at t=${sample.timestamp}: ${detail}`,
            sample
        );
        this.name = "DegenerateIntervalError";
    }
}

export class InvalidSampleError extends SampleRejectedError {
    public readonly reason = "InvalidSample";

    constructor(sample: Sample) {
        super(
            `Sample has non-finite fields (timestamp=${sample.timestamp}, value=${sample.value})`,
            sample
        );
        this.name = "InvalidSampleError";
    }
}

export class SourceUnavailableError extends Error {
    constructor(
        message: string,
        public readonly signalId: string,
        public readonly attempts: number,
        public readonly lastError?: Error
    ) {
        super(message);
        this.name = "SourceUnavailableError";
    }
}

export class BrokerClosedError extends Error {
    constructor(public readonly signalId: string) {
        super(`Broker for signal ${signalId} is closed`);
        this.name = "BrokerClosedError";
    }
}

export class ConfigurationError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(message);
        this.name = "ConfigurationError";
    }
}

export class SignalNotFoundError extends Error {
    constructor(public readonly signalId: string) {
        super(`Unknown signal: ${signalId}`);
        this.name = "SignalNotFoundError";
    }
}

/**
 * The signal exists but cannot take the requested action in its current state
 */
export class SignalStateError extends Error {
    constructor(
        message: string,
        public readonly signalId: string
    ) {
        super(message);
        this.name = "SignalStateError";
    }
}
