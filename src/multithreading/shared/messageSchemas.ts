// src/multithreading/shared/messageSchemas.ts
import { z } from "zod";
import { PipelineSettingsSchema } from "../../pipeline/pipelineSchemas.js";
import {
    ReplaySourceSchema,
    SyntheticSourceSchema,
} from "../../sources/sampleSource.js";

const MetricLabelsSchema = z.record(z.string()).optional();

export const WorkerInitDataSchema = z.object({
    signalId: z.string().min(1),
    source: z.discriminatedUnion("kind", [
        SyntheticSourceSchema,
        ReplaySourceSchema,
    ]),
    settings: PipelineSettingsSchema,
    debugLogging: z.boolean(),
});

export const ProxyLogMessageSchema = z.object({
    type: z.literal("log_message"),
    data: z.object({
        level: z.enum(["info", "error", "warn", "debug"]),
        message: z.string(),
        context: z.record(z.unknown()).optional(),
        correlationId: z.string().optional(),
    }),
});

export const MetricsMessageSchema = z.object({
    type: z.literal("metrics"),
    action: z.enum(["increment", "gauge", "histogram"]),
    name: z.string().min(1),
    value: z.number(),
    labels: MetricLabelsSchema,
});

export const PointMessageSchema = z.object({
    type: z.literal("point"),
    x: z.number(),
    y: z.number(),
});

export const TerminalMessageSchema = z.object({
    type: z.literal("terminal"),
    reason: z.enum(["SourceUnavailable", "EndOfStream", "Shutdown"]),
    message: z.string(),
});

export const PipelineExitMessageSchema = z.object({
    type: z.literal("pipeline_exit"),
    outcome: z.enum(["completed", "failed", "stopped"]),
    stats: z.object({
        samplesIngested: z.number(),
        pointsPublished: z.number(),
        samplesRejected: z.number(),
    }),
});

export const PipelineErrorMessageSchema = z.object({
    type: z.literal("pipeline_error"),
    message: z.string(),
});

export const WorkerOutboundMessageSchema = z.discriminatedUnion("type", [
    PointMessageSchema,
    TerminalMessageSchema,
    ProxyLogMessageSchema,
    MetricsMessageSchema,
    PipelineExitMessageSchema,
    PipelineErrorMessageSchema,
]);

export const StopMessageSchema = z.object({
    type: z.literal("stop"),
});

export type WorkerInitData = z.infer<typeof WorkerInitDataSchema>;
export type ProxyLogMessage = z.infer<typeof ProxyLogMessageSchema>;
export type MetricsMessage = z.infer<typeof MetricsMessageSchema>;
export type WorkerOutboundMessage = z.infer<typeof WorkerOutboundMessageSchema>;
export type StopMessage = z.infer<typeof StopMessageSchema>;
