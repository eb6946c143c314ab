// src/multithreading/shared/workerMetricsProxy.ts
import type {
    IMetricsRecorder,
    MetricLabels,
} from "../../infrastructure/metricsCollectorInterface.js";
import type { MetricsMessage } from "./messageSchemas.js";
import type { WorkerPort } from "./workerPort.js";

/**
 * Worker-side recorder. Every update is forwarded to the parent's
 * MetricsCollector so /metrics shows one set of series per process.
 */
export class WorkerMetricsProxy implements IMetricsRecorder {
    constructor(private readonly port: WorkerPort) {}

    public incrementCounter(
        name: string,
        increment = 1,
        labels?: MetricLabels
    ): void {
        this.send("increment", name, increment, labels);
    }

    public setGauge(name: string, value: number, labels?: MetricLabels): void {
        this.send("gauge", name, value, labels);
    }

    public recordHistogram(
        name: string,
        value: number,
        labels?: MetricLabels
    ): void {
        this.send("histogram", name, value, labels);
    }

    private send(
        action: MetricsMessage["action"],
        name: string,
        value: number,
        labels?: MetricLabels
    ): void {
        const message: MetricsMessage = {
            type: "metrics",
            action,
            name,
            value,
            labels,
        };
        this.port.postMessage(message);
    }
}
