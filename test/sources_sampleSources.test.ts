import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import {
    createSampleSource,
    PushSampleSource,
    ReplaySampleSource,
    ReplaySourceSchema,
    SyntheticSampleSource,
    SyntheticSourceSchema,
    type SampleSource,
} from "../src/sources/index.js";
import type { Sample } from "../src/types/streamTypes.js";

async function collect(source: SampleSource): Promise<Sample[]> {
    const samples: Sample[] = [];
    for (;;) {
        const sample = await source.next();
        if (sample === undefined) return samples;
        samples.push(sample);
    }
}

describe("sources/SyntheticSampleSource", () => {
    it("generates a ramp with timestamps in seconds", async () => {
        const source = new SyntheticSampleSource(
            SyntheticSourceSchema.parse({
                kind: "synthetic",
                waveform: "ramp",
                slope: 2,
                sampleIntervalMs: 500,
                sampleCount: 3,
                realtime: false,
            })
        );

        expect(await collect(source)).toEqual([
            { timestamp: 0, value: 0 },
            { timestamp: 0.5, value: 1 },
            { timestamp: 1, value: 2 },
        ]);
        expect(source.name).toBe("synthetic:ramp");
    });

    it("adds bounded noise from the injected random source", async () => {
        const source = new SyntheticSampleSource(
            SyntheticSourceSchema.parse({
                kind: "synthetic",
                noise: 0.1,
                sampleCount: 1,
                realtime: false,
            }),
            () => 1
        );

        const [sample] = await collect(source);
        expect(sample?.timestamp).toBe(0);
        expect(sample?.value).toBeCloseTo(0.1, 12);
    });

    it("follows a sine wave", async () => {
        const source = new SyntheticSampleSource(
            SyntheticSourceSchema.parse({
                kind: "synthetic",
                amplitude: 2,
                frequencyHz: 0.25,
                sampleIntervalMs: 1000,
                sampleCount: 2,
                realtime: false,
            })
        );

        const samples = await collect(source);
        expect(samples[1]?.timestamp).toBe(1);
        expect(samples[1]?.value).toBeCloseTo(2, 12);
    });

    it("stops pacing and ends when closed", async () => {
        const source = new SyntheticSampleSource(
            SyntheticSourceSchema.parse({
                kind: "synthetic",
                sampleIntervalMs: 60000,
                realtime: true,
            })
        );

        await source.next();
        const paced = source.next();
        await source.close();

        await expect(paced).resolves.toBeUndefined();
        await expect(source.next()).resolves.toBeUndefined();
    });
});

describe("sources/ReplaySampleSource", () => {
    let dir: string;

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), "replay-source-"));
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it("reads csv rows and skips headers, comments and bad rows", async () => {
        const path = join(dir, "trace.csv");
        await writeFile(path, "timestamp,value\n0,1\n# comment\n\n1;3\nbad,row\n2\t5\n");
        const source = new ReplaySampleSource(
            ReplaySourceSchema.parse({ kind: "replay", path, format: "csv" })
        );

        expect(await collect(source)).toEqual([
            { timestamp: 0, value: 1 },
            { timestamp: 1, value: 3 },
            { timestamp: 2, value: 5 },
        ]);
        expect(source.skippedLines).toBe(2);
    });

    it("reads json lines as objects or pairs", async () => {
        const path = join(dir, "trace.jsonl");
        await writeFile(
            path,
            '{"timestamp":0,"value":1}\n[1,2]\n{"timestamp":"x","value":1}\nnot json\n'
        );
        const source = new ReplaySampleSource(
            ReplaySourceSchema.parse({ kind: "replay", path, format: "jsonl" })
        );

        expect(await collect(source)).toEqual([
            { timestamp: 0, value: 1 },
            { timestamp: 1, value: 2 },
        ]);
        expect(source.skippedLines).toBe(2);
    });

    it("keeps failing on a missing file so the caller can retry", async () => {
        const source = new ReplaySampleSource(
            ReplaySourceSchema.parse({ kind: "replay", path: join(dir, "missing.csv") })
        );

        await expect(source.next()).rejects.toMatchObject({ code: "ENOENT" });
        await expect(source.next()).rejects.toMatchObject({ code: "ENOENT" });
    });
});

describe("sources/PushSampleSource", () => {
    it("accepts samples up to its capacity", async () => {
        const source = new PushSampleSource(2);

        const accepted = source.push([
            { timestamp: 0, value: 0 },
            { timestamp: 1, value: 1 },
            { timestamp: 2, value: 2 },
        ]);

        expect(accepted).toBe(2);
        expect(source.pending).toBe(2);
        await expect(source.next()).resolves.toEqual({ timestamp: 0, value: 0 });
    });

    it("hands a pushed sample straight to a waiting reader", async () => {
        const source = new PushSampleSource(1);
        const waiting = source.next();

        expect(source.push([{ timestamp: 5, value: 1 }])).toBe(1);

        await expect(waiting).resolves.toEqual({ timestamp: 5, value: 1 });
        expect(source.pending).toBe(0);
    });

    it("ends a waiting reader on close and refuses more samples", async () => {
        const source = new PushSampleSource(4);
        const waiting = source.next();

        await source.close();

        await expect(waiting).resolves.toBeUndefined();
        expect(source.push([{ timestamp: 0, value: 0 }])).toBe(0);
        expect(source.isClosed).toBe(true);
    });
});

describe("sources/createSampleSource", () => {
    it("builds the source for each kind", () => {
        expect(
            createSampleSource(SyntheticSourceSchema.parse({ kind: "synthetic" }))
        ).toBeInstanceOf(SyntheticSampleSource);
        expect(
            createSampleSource(ReplaySourceSchema.parse({ kind: "replay", path: "x.csv" }))
        ).toBeInstanceOf(ReplaySampleSource);
        expect(createSampleSource({ kind: "push", capacity: 8 })).toBeInstanceOf(
            PushSampleSource
        );
    });
});
