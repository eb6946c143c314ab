// src/infrastructure/metricsCollectorInterface.ts

import type {
    HealthSummary,
    HistogramSummary,
    MetricsSnapshot,
} from "./metricsCollector.js";

export type MetricLabels = Record<string, string>;

/**
 * Write side of metrics. Components on both the main thread and worker
 * threads record through this.
 */
export interface IMetricsRecorder {
    incrementCounter(name: string, increment?: number, labels?: MetricLabels): void;
    setGauge(name: string, value: number, labels?: MetricLabels): void;
    recordHistogram(name: string, value: number, labels?: MetricLabels): void;
}

/**
 * Interface for metrics collection and management
 */
export interface IMetricsCollector extends IMetricsRecorder {
    getCounter(name: string, labels?: MetricLabels): number;
    getGauge(name: string, labels?: MetricLabels): number | null;
    getHistogramSummary(name: string, labels?: MetricLabels): HistogramSummary | null;

    getMetrics(): MetricsSnapshot;
    getHealthSummary(): HealthSummary;

    exportPrometheus(): string;
    exportJSON(): string;

    reset(): void;
}
