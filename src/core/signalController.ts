// src/core/signalController.ts
import { z } from "zod";
import type { StreamBroker } from "../broker/streamBroker.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import { DispatchInProgressError } from "../pipeline/dispatcher.js";
import type { SignalRegistry } from "../pipeline/signalRegistry.js";
import { SampleSchema } from "../sources/sampleSource.js";
import type { EventStreamEndpoint } from "../endpoint/eventStreamEndpoint.js";
import {
    BrokerClosedError,
    SignalNotFoundError,
    SignalStateError,
} from "./errors.js";

export interface HttpResult {
    status: number;
    body: unknown;
    /** Defaults to JSON */
    contentType?: string;
}

export type StreamTarget =
    | { ok: true; broker: StreamBroker }
    | { ok: false; result: HttpResult };

export const PushSamplesBodySchema = z.object({
    samples: z.array(SampleSchema).min(1).max(10000),
});

const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

/**
 * Request handling behind the HTTP routes, independent of express
 */
export class SignalController {
    constructor(
        private readonly registry: SignalRegistry,
        private readonly endpoint: EventStreamEndpoint,
        private readonly metricsCollector: IMetricsCollector
    ) {}

    /**
     * Broker to stream from. A signal whose dispatch already ended has
     * nothing more to send until it is restarted, so it is refused.
     */
    public streamTarget(signalId: string): StreamTarget {
        const entry = this.registry.get(signalId);
        if (!entry) {
            return { ok: false, result: notFound(signalId) };
        }
        const state = entry.dispatcher.state;
        if (state === "completed" || state === "failed") {
            return {
                ok: false,
                result: {
                    status: 409,
                    body: {
                        status: "error",
                        error: `Signal ${signalId} has ${state}; start it again before streaming`,
                    },
                },
            };
        }
        return { ok: true, broker: entry.broker };
    }

    public listSignals(): HttpResult {
        return { status: 200, body: { signals: this.registry.list() } };
    }

    public startSignal(signalId: string): HttpResult {
        return this.guard(signalId, () => {
            this.registry.start(signalId);
            return { status: 202, body: this.statusOf(signalId) };
        });
    }

    public async stopSignal(signalId: string): Promise<HttpResult> {
        if (!this.registry.get(signalId)) {
            return notFound(signalId);
        }
        await this.registry.stop(signalId);
        return { status: 200, body: this.statusOf(signalId) };
    }

    public pushSamples(signalId: string, body: unknown): HttpResult {
        const parsed = PushSamplesBodySchema.safeParse(body);
        if (!parsed.success) {
            return {
                status: 400,
                body: {
                    status: "error",
                    error: "Invalid sample batch",
                    issues: parsed.error.errors.map(
                        (issue) => `${issue.path.join(".")}: ${issue.message}`
                    ),
                },
            };
        }

        return this.guard(signalId, () => {
            const result = this.registry.pushSamples(signalId, parsed.data.samples);
            return { status: result.rejected > 0 ? 429 : 202, body: result };
        });
    }

    public health(): HttpResult {
        const health = this.metricsCollector.getHealthSummary();
        return {
            status: 200,
            body: {
                ...health,
                signals: this.registry.size,
                sessions: this.endpoint.getSessionCount(),
            },
        };
    }

    public stats(correlationId: string): HttpResult {
        return {
            status: 200,
            body: {
                metrics: this.metricsCollector.getMetrics(),
                health: this.metricsCollector.getHealthSummary(),
                signals: this.registry.list(),
                correlationId,
            },
        };
    }

    public metrics(): HttpResult {
        return {
            status: 200,
            body: this.metricsCollector.exportPrometheus(),
            contentType: PROMETHEUS_CONTENT_TYPE,
        };
    }

    private statusOf(signalId: string): unknown {
        return this.registry.list().find((status) => status.id === signalId);
    }

    /**
     * Map registry errors onto status codes; anything else propagates
     */
    private guard(signalId: string, action: () => HttpResult): HttpResult {
        try {
            return action();
        } catch (error) {
            if (error instanceof SignalNotFoundError) {
                return notFound(signalId);
            }
            if (
                error instanceof SignalStateError ||
                error instanceof DispatchInProgressError ||
                error instanceof BrokerClosedError
            ) {
                return {
                    status: 409,
                    body: { status: "error", error: error.message },
                };
            }
            throw error;
        }
    }
}

function notFound(signalId: string): HttpResult {
    return {
        status: 404,
        body: { status: "error", error: `Unknown signal: ${signalId}` },
    };
}
