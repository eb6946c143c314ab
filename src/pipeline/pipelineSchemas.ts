// src/pipeline/pipelineSchemas.ts
import { z } from "zod";

export const EstimatorSettingsSchema = z.object({
    windowSize: z.number().int().min(2).max(1024),
    method: z.enum(["backward", "secant", "regression"]),
    acceptEqualTimestamps: z.boolean(),
});

export const RetrySettingsSchema = z
    .object({
        maxRetries: z.number().int().min(0).max(100),
        baseDelayMs: z.number().int().min(0).max(60000),
        maxDelayMs: z.number().int().min(0).max(600000),
        backoffMultiplier: z.number().min(1).max(10),
        jitter: z.boolean(),
    })
    .refine((retry) => retry.maxDelayMs >= retry.baseDelayMs, {
        message: "maxDelayMs must not be smaller than baseDelayMs",
        path: ["maxDelayMs"],
    });

export const PipelineSettingsSchema = z.object({
    estimator: EstimatorSettingsSchema,
    retry: RetrySettingsSchema,
    yieldEvery: z.number().int().min(1).max(100000),
});
