// src/sources/replaySampleSource.ts

import { open, type FileHandle } from "fs/promises";
import readline from "readline";
import type { Sample } from "../types/streamTypes.js";
import { ProductionUtils } from "../utils/productionUtils.js";
import {
    SampleSchema,
    type ReplaySourceSpec,
    type SampleSource,
} from "./sampleSource.js";

/**
 * Replays a recorded trace line by line.
 *
 * csv:   `timestamp,value` per line; a header, blank lines and `#` comments are skipped
 * jsonl: `{"timestamp":..,"value":..}` or `[timestamp, value]` per line
 *
 * Lines that do not parse are skipped and counted. Opening the file is
 * retried on the next call when it fails.
 */
export class ReplaySampleSource implements SampleSource {
    public readonly name: string;
    private handle: FileHandle | undefined;
    private reader: readline.Interface | undefined;
    private lines: AsyncIterator<string> | undefined;
    private skipped = 0;
    private emitted = 0;
    private exhausted = false;
    private readonly abort = new AbortController();

    constructor(private readonly spec: ReplaySourceSpec) {
        this.name = `replay:${spec.path}`;
    }

    public async next(): Promise<Sample | undefined> {
        if (this.exhausted) return undefined;
        const lines = await this.ensureOpen();

        if (this.spec.paceMs > 0 && this.emitted > 0) {
            try {
                await ProductionUtils.sleep(this.spec.paceMs, this.abort.signal);
            } catch (error) {
                if (ProductionUtils.isAbortError(error)) return undefined;
                throw error;
            }
        }

        for (;;) {
            const line = await lines.next();
            if (line.done === true) {
                await this.close();
                return undefined;
            }
            const sample = this.parseLine(line.value);
            if (sample) {
                this.emitted++;
                return sample;
            }
        }
    }

    public async close(): Promise<void> {
        this.exhausted = true;
        this.abort.abort();
        this.reader?.close();
        this.reader = undefined;
        this.lines = undefined;
        const handle = this.handle;
        this.handle = undefined;
        await handle?.close();
    }

    public get skippedLines(): number {
        return this.skipped;
    }

    private async ensureOpen(): Promise<AsyncIterator<string>> {
        if (this.lines) return this.lines;
        this.handle = await open(this.spec.path, "r");
        this.reader = readline.createInterface({
            input: this.handle.createReadStream({ encoding: "utf8" }),
            crlfDelay: Infinity,
        });
        this.lines = this.reader[Symbol.asyncIterator]();
        return this.lines;
    }

    private parseLine(raw: string): Sample | undefined {
        const line = raw.trim();
        if (line === "" || line.startsWith("#")) return undefined;

        const sample =
            this.spec.format === "csv"
                ? parseCsvLine(line)
                : parseJsonLine(line);
        if (!sample) this.skipped++;
        return sample;
    }
}

function parseCsvLine(line: string): Sample | undefined {
    const [t, v] = line.split(/[,;\t]/).map((field) => field.trim());
    if (t === undefined || v === undefined || t === "" || v === "") {
        return undefined;
    }
    const timestamp = Number(t);
    const value = Number(v);
    // A header row parses to NaN and is dropped here
    if (Number.isNaN(timestamp) || Number.isNaN(value)) return undefined;
    return { timestamp, value };
}

function parseJsonLine(line: string): Sample | undefined {
    let parsed: unknown;
    try {
        parsed = JSON.parse(line);
    } catch {
        return undefined;
    }
    if (Array.isArray(parsed)) {
        const [timestamp, value] = parsed;
        parsed = { timestamp, value };
    }
    const result = SampleSchema.safeParse(parsed);
    return result.success ? result.data : undefined;
}
