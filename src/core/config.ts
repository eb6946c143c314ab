// src/core/config.ts
import dotenv from "dotenv";
dotenv.config();
import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import type { LogLevel } from "../infrastructure/loggerInterface.js";
import {
    EstimatorSettingsSchema,
    RetrySettingsSchema,
} from "../pipeline/pipelineSchemas.js";
import type {
    PipelineSettings,
    SourceRetrySettings,
} from "../pipeline/signalPipeline.js";
import type { DerivativeEstimatorOptions } from "../estimation/derivativeEstimator.js";
import { SourceSpecSchema } from "../sources/sampleSource.js";
import { ConfigurationError } from "./errors.js";

export const SignalConfigSchema = z
    .object({
        id: z
            .string()
            .regex(/^[A-Za-z0-9_-]{1,64}$/, "Signal id must be 1-64 letters, digits, _ or -"),
        dispatch: z.enum(["inline", "worker"]).default("inline"),
        autoStart: z.boolean().default(true),
        source: SourceSpecSchema,
    })
    .refine(
        (signal) => !(signal.dispatch === "worker" && signal.source.kind === "push"),
        {
            message: "Push sources are fed over HTTP and can only run inline",
            path: ["dispatch"],
        }
    );

const ConfigSchema = z
    .object({
        nodeEnv: z.string(),
        http: z.object({
            host: z.string().min(1),
            port: z.number().int().min(0).max(65535),
        }),
        logging: z.object({
            level: z.enum(["debug", "info", "warn", "error"]),
            /** Defaults to pretty output when nodeEnv is development */
            pretty: z.boolean().optional(),
        }),
        estimator: EstimatorSettingsSchema,
        broker: z.object({
            backlogCapacity: z.number().int().min(1).max(100000),
        }),
        endpoint: z.object({
            heartbeatIntervalMs: z.number().int().min(0).max(600000),
            retryHintMs: z.number().int().min(0).max(600000),
            shutdownGraceMs: z.number().int().min(0).max(60000),
        }),
        retry: RetrySettingsSchema,
        pipeline: z.object({
            yieldEvery: z.number().int().min(1).max(100000),
        }),
        defaultSignal: z.string().min(1),
        signals: z.array(SignalConfigSchema).min(1),
    })
    .superRefine((config, ctx) => {
        const seen = new Set<string>();
        config.signals.forEach((signal, index) => {
            if (seen.has(signal.id)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Duplicate signal id "${signal.id}"`,
                    path: ["signals", index, "id"],
                });
            }
            seen.add(signal.id);
        });
        if (!seen.has(config.defaultSignal)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `defaultSignal "${config.defaultSignal}" is not a configured signal`,
                path: ["defaultSignal"],
            });
        }
    });

export type AppConfig = z.infer<typeof ConfigSchema>;
export type SignalConfig = z.infer<typeof SignalConfigSchema>;

export interface BrokerSettings {
    backlogCapacity: number;
}

export interface EndpointSettings {
    heartbeatIntervalMs: number;
    retryHintMs: number;
    shutdownGraceMs: number;
}

type Environment = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * HTTP_HOST, HTTP_PORT, LOG_LEVEL and NODE_ENV override config.json
 */
function applyEnvOverrides(raw: unknown, env: Environment): unknown {
    if (!isRecord(raw)) return raw;

    const http: Record<string, unknown> = isRecord(raw["http"]) ? { ...raw["http"] } : {};
    if (env["HTTP_HOST"]) http["host"] = env["HTTP_HOST"];
    if (env["HTTP_PORT"]) {
        const port = Number(env["HTTP_PORT"]);
        // Leave an unparsable value in place so validation reports it
        http["port"] = Number.isFinite(port) ? port : env["HTTP_PORT"];
    }

    const logging: Record<string, unknown> = isRecord(raw["logging"]) ? { ...raw["logging"] } : {};
    if (env["LOG_LEVEL"]) logging["level"] = env["LOG_LEVEL"].toLowerCase();

    const overridden: Record<string, unknown> = { ...raw, http, logging };
    if (env["NODE_ENV"]) overridden["nodeEnv"] = env["NODE_ENV"];
    return overridden;
}

/**
 * Validate already-parsed configuration, environment overrides included.
 */
export function parseConfig(raw: unknown, env: Environment = process.env): AppConfig {
    const result = ConfigSchema.safeParse(applyEnvOverrides(raw, env));
    if (!result.success) {
        const issues = result.error.errors.map(
            (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
        );
        throw new ConfigurationError("Configuration validation failed", issues);
    }
    return result.data;
}

/**
 * Read and validate a config file. Throws ConfigurationError on any problem.
 */
export function loadConfig(
    path: string = resolve(process.cwd(), process.env["CONFIG_PATH"] ?? "config.json"),
    env: Environment = process.env
): AppConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
        throw new ConfigurationError(`Cannot read config file ${path}`, [
            error instanceof Error ? error.message : String(error),
        ]);
    }
    return parseConfig(raw, env);
}

let cfg: AppConfig | undefined;

function current(): AppConfig {
    if (!cfg) {
        cfg = loadConfig();
    }
    return cfg;
}

/**
 * Centralized configuration management
 */
export class Config {
    /** Replace the active configuration (used at startup and in tests) */
    static use(config: AppConfig): void {
        cfg = config;
    }

    static reset(): void {
        cfg = undefined;
    }

    static get NODE_ENV(): string {
        return current().nodeEnv;
    }

    // Server configuration
    static get HTTP_HOST(): string {
        return current().http.host;
    }
    static get HTTP_PORT(): number {
        return current().http.port;
    }

    static get LOG_LEVEL(): LogLevel {
        return current().logging.level;
    }
    static get LOG_PRETTY(): boolean {
        const config = current();
        return config.logging.pretty ?? config.nodeEnv === "development";
    }

    // Pipeline configuration
    static get ESTIMATOR(): DerivativeEstimatorOptions {
        return { ...current().estimator };
    }
    static get RETRY(): SourceRetrySettings {
        return { ...current().retry };
    }
    static get PIPELINE(): PipelineSettings {
        return {
            estimator: Config.ESTIMATOR,
            retry: Config.RETRY,
            yieldEvery: current().pipeline.yieldEvery,
        };
    }

    // Delivery configuration
    static get BROKER(): BrokerSettings {
        return { ...current().broker };
    }
    static get ENDPOINT(): EndpointSettings {
        return { ...current().endpoint };
    }

    // Signals
    static get SIGNALS(): SignalConfig[] {
        return current().signals;
    }
    static get DEFAULT_SIGNAL(): string {
        return current().defaultSignal;
    }
}
