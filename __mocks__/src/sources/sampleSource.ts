// __mocks__/src/sources/sampleSource.ts
import type { SampleSource } from "../../../src/sources/sampleSource.js";
import type { Sample } from "../../../src/types/streamTypes.js";

/**
 * Plays back a fixed script: a Sample is returned, an Error is thrown.
 * Past the end of the script the source is exhausted.
 */
export class ScriptedSource implements SampleSource {
    public readonly name: string;
    public calls = 0;
    public closed = false;

    constructor(
        private readonly steps: ReadonlyArray<Sample | Error>,
        name = "scripted"
    ) {
        this.name = name;
    }

    public async next(): Promise<Sample | undefined> {
        const step = this.steps[this.calls];
        this.calls++;
        if (step instanceof Error) throw step;
        return step;
    }

    public async close(): Promise<void> {
        this.closed = true;
    }
}

/**
 * Fails every read with the same error
 */
export class FailingSource implements SampleSource {
    public readonly name = "flaky";
    public calls = 0;
    public closed = false;

    constructor(private readonly message = "down") {}

    public async next(): Promise<Sample | undefined> {
        this.calls++;
        throw new Error(this.message);
    }

    public async close(): Promise<void> {
        this.closed = true;
    }
}

export const samples = (...pairs: Array<[number, number]>): Sample[] =>
    pairs.map(([timestamp, value]) => ({ timestamp, value }));
