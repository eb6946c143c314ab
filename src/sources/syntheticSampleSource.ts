// src/sources/syntheticSampleSource.ts

import type { Sample } from "../types/streamTypes.js";
import { ProductionUtils } from "../utils/productionUtils.js";
import type { SampleSource, SyntheticSourceSpec } from "./sampleSource.js";

/**
 * Generated test signal. Timestamps are in seconds from the first sample,
 * so the true derivative of the sine is `A * 2πf * cos(2πf t)`.
 */
export class SyntheticSampleSource implements SampleSource {
    public readonly name: string;
    private index = 0;
    private closed = false;
    private readonly abort = new AbortController();

    constructor(
        private readonly spec: SyntheticSourceSpec,
        private readonly random: () => number = Math.random
    ) {
        this.name = `synthetic:${spec.waveform}`;
    }

    public async next(): Promise<Sample | undefined> {
        if (this.closed) return undefined;
        if (
            this.spec.sampleCount !== undefined &&
            this.index >= this.spec.sampleCount
        ) {
            return undefined;
        }

        if (this.spec.realtime && this.index > 0) {
            try {
                await ProductionUtils.sleep(
                    this.spec.sampleIntervalMs,
                    this.abort.signal
                );
            } catch (error) {
                if (ProductionUtils.isAbortError(error)) return undefined;
                throw error;
            }
        }

        const timestamp = (this.index * this.spec.sampleIntervalMs) / 1000;
        this.index++;
        return { timestamp, value: this.valueAt(timestamp) };
    }

    public async close(): Promise<void> {
        this.closed = true;
        this.abort.abort();
    }

    private valueAt(t: number): number {
        const clean =
            this.spec.waveform === "sine"
                ? this.spec.amplitude *
                  Math.sin(2 * Math.PI * this.spec.frequencyHz * t)
                : this.spec.slope * t;
        if (this.spec.noise === 0) return clean;
        return clean + (this.random() * 2 - 1) * this.spec.noise;
    }
}
