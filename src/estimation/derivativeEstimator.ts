// src/estimation/derivativeEstimator.ts

import { CircularBuffer } from "../utils/circularBuffer.js";
import {
    DegenerateIntervalError,
    InvalidSampleError,
    OutOfOrderSampleError,
} from "../core/errors.js";
import type { DerivativePoint, Sample } from "../types/streamTypes.js";

/**
 * - backward:   slope between the two newest samples
 * - secant:     slope between the oldest and newest sample of the window
 * - regression: least-squares slope over every sample in the window
 */
export type DerivativeMethod = "backward" | "secant" | "regression";

export interface DerivativeEstimatorOptions {
    /** Samples needed before the first estimate; also the smoothing span. */
    windowSize: number;
    method: DerivativeMethod;
    /**
     * When true an equal timestamp passes the ordering check, is consumed
     * and reported as a degenerate interval. When false it is out of order.
     */
    acceptEqualTimestamps: boolean;
}

export const DEFAULT_ESTIMATOR_OPTIONS: DerivativeEstimatorOptions = {
    windowSize: 3,
    method: "backward",
    acceptEqualTimestamps: false,
};

export interface EstimatorSnapshot {
    window: Sample[];
    lastPoint: DerivativePoint | undefined;
    acceptedSamples: number;
    emittedPoints: number;
    warmedUp: boolean;
}

/**
 * Incremental finite-difference estimator for a single signal.
 *
 * `ingest` returns a point once the window is full, `undefined` during
 * warm-up, and throws a SampleRejectedError subclass for samples it cannot
 * use. Rejected samples never touch the window; a degenerate interval is the
 * one case where the sample is kept but no point is produced.
 */
export class DerivativeEstimator {
    private readonly options: DerivativeEstimatorOptions;
    private readonly window: CircularBuffer<Sample>;
    private lastPoint: DerivativePoint | undefined;
    private acceptedSamples = 0;
    private emittedPoints = 0;

    constructor(options: Partial<DerivativeEstimatorOptions> = {}) {
        this.options = { ...DEFAULT_ESTIMATOR_OPTIONS, ...options };
        if (
            !Number.isInteger(this.options.windowSize) ||
            this.options.windowSize < 2
        ) {
            throw new RangeError(
                `windowSize must be an integer >= 2, got ${this.options.windowSize}`
            );
        }
        this.window = new CircularBuffer<Sample>(this.options.windowSize);
    }

    public ingest(sample: Sample): DerivativePoint | undefined {
        if (!Number.isFinite(sample.timestamp) || !Number.isFinite(sample.value)) {
            throw new InvalidSampleError(sample);
        }

        const previous = this.window.newest();
        if (previous !== undefined) {
            const isTie = sample.timestamp === previous.timestamp;
            if (
                sample.timestamp < previous.timestamp ||
                (isTie && !this.options.acceptEqualTimestamps)
            ) {
                throw new OutOfOrderSampleError(sample, previous.timestamp);
            }

            if (isTie) {
                this.accept(sample);
                throw new DegenerateIntervalError(
                    sample,
                    "zero time delta to previous sample"
                );
            }
        }

        this.accept(sample);
        if (!this.window.isFull) return undefined;

        const slope = this.computeSlope();
        if (slope === undefined || !Number.isFinite(slope)) {
            throw new DegenerateIntervalError(
                sample,
                `${this.options.method} slope is undefined over the window`
            );
        }

        const point: DerivativePoint = Object.freeze({
            x: sample.timestamp,
            y: slope,
        });
        this.lastPoint = point;
        this.emittedPoints++;
        return point;
    }

    public getState(): EstimatorSnapshot {
        return {
            window: this.window.toArray(),
            lastPoint: this.lastPoint,
            acceptedSamples: this.acceptedSamples,
            emittedPoints: this.emittedPoints,
            warmedUp: this.window.isFull,
        };
    }

    public reset(): void {
        this.window.clear();
        this.lastPoint = undefined;
        this.acceptedSamples = 0;
        this.emittedPoints = 0;
    }

    public get windowSize(): number {
        return this.options.windowSize;
    }

    public get method(): DerivativeMethod {
        return this.options.method;
    }

    private accept(sample: Sample): void {
        this.window.push(sample);
        this.acceptedSamples++;
    }

    private computeSlope(): number | undefined {
        switch (this.options.method) {
            case "backward":
                return this.slopeBetween(
                    this.window.length - 2,
                    this.window.length - 1
                );
            case "secant":
                return this.slopeBetween(0, this.window.length - 1);
            case "regression":
                return this.regressionSlope();
        }
    }

    private slopeBetween(from: number, to: number): number | undefined {
        const a = this.window.at(from);
        const b = this.window.at(to);
        if (a === undefined || b === undefined) return undefined;
        const dt = b.timestamp - a.timestamp;
        if (dt === 0) return undefined;
        return (b.value - a.value) / dt;
    }

    // Centered sums keep large timestamps from swamping the slope
    private regressionSlope(): number | undefined {
        const n = this.window.length;
        let meanT = 0;
        let meanY = 0;
        for (let i = 0; i < n; i++) {
            const s = this.window.at(i);
            if (s === undefined) return undefined;
            meanT += s.timestamp;
            meanY += s.value;
        }
        meanT /= n;
        meanY /= n;

        let covariance = 0;
        let variance = 0;
        for (let i = 0; i < n; i++) {
            const s = this.window.at(i);
            if (s === undefined) return undefined;
            const dt = s.timestamp - meanT;
            covariance += dt * (s.value - meanY);
            variance += dt * dt;
        }
        if (variance === 0) return undefined;
        return covariance / variance;
    }
}
