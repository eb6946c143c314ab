// src/multithreading/shared/workerProxyLogger.ts
import type { ILogger, LogLevel } from "../../infrastructure/loggerInterface.js";
import { ProxyLogMessageSchema, type ProxyLogMessage } from "./messageSchemas.js";
import type { WorkerPort } from "./workerPort.js";

/**
 * Logger used inside worker threads. Entries are posted to the parent,
 * which writes them through its own logger.
 */
export class WorkerProxyLogger implements ILogger {
    constructor(
        private readonly workerName: string,
        private readonly port: WorkerPort,
        private readonly debugEnabled = false
    ) {}

    public info(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.sendLogMessage("info", message, context, correlationId);
    }

    public error(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.sendLogMessage("error", message, context, correlationId);
    }

    public warn(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.sendLogMessage("warn", message, context, correlationId);
    }

    public debug(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        if (!this.debugEnabled) return;
        this.sendLogMessage("debug", message, context, correlationId);
    }

    public isDebugEnabled(): boolean {
        return this.debugEnabled;
    }

    // Scopes live in the parent logger, which resolves the forwarded correlationId
    public setCorrelationId(_id: string, _context: string): void {}

    public removeCorrelationId(_id: string): void {}

    private sendLogMessage(
        level: LogLevel,
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        const logMessage: ProxyLogMessage = {
            type: "log_message",
            data: {
                level,
                message,
                context: {
                    ...serializeContext(context),
                    worker: this.workerName,
                },
                correlationId,
            },
        };

        const validation = ProxyLogMessageSchema.safeParse(logMessage);
        if (!validation.success) {
            console.error(
                `[${this.workerName}] Invalid log message:`,
                validation.error.message
            );
            return;
        }

        try {
            this.port.postMessage(validation.data);
        } catch (error) {
            // Port already closed while the worker winds down
            console.error(`[${this.workerName}] Failed to send log message:`, error);
            console.error(`[${this.workerName}] ${message}`, context);
        }
    }
}

/**
 * Error values become plain objects before crossing the port
 */
function serializeContext(
    context: Record<string, unknown> | undefined
): Record<string, unknown> {
    if (!context) return {};
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(context)) {
        result[key] =
            value instanceof Error
                ? { name: value.name, message: value.message, stack: value.stack }
                : value;
    }
    return result;
}
