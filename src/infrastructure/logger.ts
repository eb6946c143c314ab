// src/infrastructure/logger.ts
import util from "node:util";
import type { ILogger, LogLevel } from "./loggerInterface.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Structured logger for the stream service
 */
export class Logger implements ILogger {
    private readonly correlationContext = new Map<string, string>();

    constructor(
        private readonly pretty = false,
        private readonly minLevel: LogLevel = "info"
    ) {}

    public info(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("info", message, context, correlationId);
    }

    public error(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("error", message, context, correlationId);
    }

    public warn(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("warn", message, context, correlationId);
    }

    public debug(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("debug", message, context, correlationId);
    }

    public isDebugEnabled(): boolean {
        return LEVEL_ORDER[this.minLevel] <= LEVEL_ORDER.debug;
    }

    public setCorrelationId(id: string, context: string): void {
        this.correlationContext.set(id, context);
    }

    public removeCorrelationId(id: string): void {
        this.correlationContext.delete(id);
    }

    private log(
        level: LogLevel,
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

        const correlationScope =
            correlationId !== undefined
                ? this.correlationContext.get(correlationId)
                : undefined;

        if (this.pretty) {
            console.log(
                `[${level.toUpperCase()}] ${message}`,
                context
                    ? util.inspect(context, {
                          colors: true,
                          depth: null,
                          compact: false,
                      })
                    : ""
            );
            return;
        }

        const logEntry = {
            timestamp: new Date().toISOString(),
            level: level.toUpperCase(),
            message,
            correlationId,
            correlationScope,
            ...context,
        };
        console.log(JSON.stringify(logEntry, errorReplacer));
    }
}

// Error instances have no enumerable fields, so spell them out.
function errorReplacer(_key: string, value: unknown): unknown {
    if (value instanceof Error) {
        return { name: value.name, message: value.message, stack: value.stack };
    }
    return value;
}
