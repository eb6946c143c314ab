// src/sources/sampleSource.ts

import { z } from "zod";
import type { Sample } from "../types/streamTypes.js";

/**
 * Pull-based producer of raw samples. `next()` resolves with `undefined`
 * once the source is exhausted. A rejected `next()` is a transient failure
 * and may be retried; the source must stay usable afterwards.
 */
export interface SampleSource {
    readonly name: string;
    next(): Promise<Sample | undefined>;
    close(): Promise<void>;
}

export const SyntheticSourceSchema = z.object({
    kind: z.literal("synthetic"),
    waveform: z.enum(["sine", "ramp"]).default("sine"),
    amplitude: z.number().default(1),
    frequencyHz: z.number().positive().default(1),
    slope: z.number().default(1),
    noise: z.number().min(0).default(0),
    sampleIntervalMs: z.number().positive().default(10),
    sampleCount: z.number().int().positive().optional(),
    realtime: z.boolean().default(true),
});

export const ReplaySourceSchema = z.object({
    kind: z.literal("replay"),
    path: z.string().min(1),
    format: z.enum(["csv", "jsonl"]).default("csv"),
    paceMs: z.number().min(0).default(0),
});

export const PushSourceSchema = z.object({
    kind: z.literal("push"),
    capacity: z.number().int().positive().default(1024),
});

export const SourceSpecSchema = z.discriminatedUnion("kind", [
    SyntheticSourceSchema,
    ReplaySourceSchema,
    PushSourceSchema,
]);

export type SyntheticSourceSpec = z.infer<typeof SyntheticSourceSchema>;
export type ReplaySourceSpec = z.infer<typeof ReplaySourceSchema>;
export type PushSourceSpec = z.infer<typeof PushSourceSchema>;
export type SourceSpec = z.infer<typeof SourceSpecSchema>;

/**
 * Sources a worker thread can rebuild from plain data
 */
export type TransferableSourceSpec = SyntheticSourceSpec | ReplaySourceSpec;

export function isTransferableSourceSpec(
    spec: SourceSpec
): spec is TransferableSourceSpec {
    return spec.kind !== "push";
}

export const SampleSchema = z.object({
    timestamp: z.number(),
    value: z.number(),
});
