// src/infrastructure/metricsCollector.ts

import { CircularBuffer } from "../utils/circularBuffer.js";
import type {
    IMetricsCollector,
    MetricLabels,
} from "./metricsCollectorInterface.js";

export interface HistogramSummary {
    count: number;
    sum: number;
    min: number;
    max: number;
    mean: number;
    p50: number;
    p95: number;
    p99: number;
}

export interface MetricsSnapshot {
    uptimeMs: number;
    counters: Record<string, number>;
    gauges: Record<string, number>;
    histograms: Record<string, HistogramSummary>;
}

export type HealthStatus = "healthy" | "degraded";

export interface HealthSummary {
    status: HealthStatus;
    uptimeMs: number;
    activeSessions: number;
    sourceFailures: number;
    overflowDrops: number;
}

interface HistogramState {
    count: number;
    sum: number;
    min: number;
    max: number;
    // Percentiles come from the most recent observations only
    recent: CircularBuffer<number>;
}

/**
 * In-memory metrics store. Series are keyed by name plus sorted labels.
 */
export class MetricsCollector implements IMetricsCollector {
    private readonly counters = new Map<string, number>();
    private readonly gauges = new Map<string, number>();
    private readonly histograms = new Map<string, HistogramState>();
    private startedAt = Date.now();

    constructor(private readonly histogramWindow = 1024) {}

    public incrementCounter(
        name: string,
        increment = 1,
        labels?: MetricLabels
    ): void {
        if (increment < 0) {
            throw new RangeError(
                `Counter ${name} cannot be decremented (got ${increment})`
            );
        }
        const key = seriesKey(name, labels);
        this.counters.set(key, (this.counters.get(key) ?? 0) + increment);
    }

    public setGauge(name: string, value: number, labels?: MetricLabels): void {
        this.gauges.set(seriesKey(name, labels), value);
    }

    public recordHistogram(
        name: string,
        value: number,
        labels?: MetricLabels
    ): void {
        if (!Number.isFinite(value)) return;
        const key = seriesKey(name, labels);
        let state = this.histograms.get(key);
        if (!state) {
            state = {
                count: 0,
                sum: 0,
                min: value,
                max: value,
                recent: new CircularBuffer<number>(this.histogramWindow),
            };
            this.histograms.set(key, state);
        }
        state.count++;
        state.sum += value;
        state.min = Math.min(state.min, value);
        state.max = Math.max(state.max, value);
        state.recent.push(value);
    }

    public getCounter(name: string, labels?: MetricLabels): number {
        return this.counters.get(seriesKey(name, labels)) ?? 0;
    }

    /**
     * Sum of a counter across all of its label sets
     */
    public getCounterTotal(name: string): number {
        let total = 0;
        for (const [key, value] of this.counters) {
            if (key === name || key.startsWith(`${name}{`)) total += value;
        }
        return total;
    }

    public getGauge(name: string, labels?: MetricLabels): number | null {
        return this.gauges.get(seriesKey(name, labels)) ?? null;
    }

    public getHistogramSummary(
        name: string,
        labels?: MetricLabels
    ): HistogramSummary | null {
        const state = this.histograms.get(seriesKey(name, labels));
        return state ? summarize(state) : null;
    }

    public getMetrics(): MetricsSnapshot {
        const histograms: Record<string, HistogramSummary> = {};
        for (const [key, state] of this.histograms) {
            histograms[key] = summarize(state);
        }
        return {
            uptimeMs: Date.now() - this.startedAt,
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
            histograms,
        };
    }

    public getHealthSummary(): HealthSummary {
        const sourceFailures = this.getCounterTotal("source_unavailable_total");
        return {
            status: sourceFailures > 0 ? "degraded" : "healthy",
            uptimeMs: Date.now() - this.startedAt,
            activeSessions: this.getGauge("sessions_active") ?? 0,
            sourceFailures,
            overflowDrops: this.getCounterTotal("broker_overflow_drops_total"),
        };
    }

    public exportPrometheus(): string {
        const lines: string[] = [];
        for (const [key, value] of this.counters) {
            lines.push(`${key} ${value}`);
        }
        for (const [key, value] of this.gauges) {
            lines.push(`${key} ${value}`);
        }
        for (const [key, state] of this.histograms) {
            const { name, labels } = splitKey(key);
            lines.push(`${name}_count${labels} ${state.count}`);
            lines.push(`${name}_sum${labels} ${state.sum}`);
        }
        return lines.length > 0 ? `${lines.join("\n")}\n` : "";
    }

    public exportJSON(): string {
        return JSON.stringify(this.getMetrics());
    }

    public reset(): void {
        this.counters.clear();
        this.gauges.clear();
        this.histograms.clear();
        this.startedAt = Date.now();
    }
}

function seriesKey(name: string, labels?: MetricLabels): string {
    if (!labels) return name;
    const entries = Object.entries(labels).sort(([a], [b]) =>
        a.localeCompare(b)
    );
    if (entries.length === 0) return name;
    const rendered = entries
        .map(([label, value]) => `${label}="${value.replace(/"/g, '\\"')}"`)
        .join(",");
    return `${name}{${rendered}}`;
}

function splitKey(key: string): { name: string; labels: string } {
    const brace = key.indexOf("{");
    return brace === -1
        ? { name: key, labels: "" }
        : { name: key.slice(0, brace), labels: key.slice(brace) };
}

function summarize(state: HistogramState): HistogramSummary {
    const sorted = state.recent.toArray().sort((a, b) => a - b);
    return {
        count: state.count,
        sum: state.sum,
        min: state.min,
        max: state.max,
        mean: state.count === 0 ? 0 : state.sum / state.count,
        p50: percentile(sorted, 50),
        p95: percentile(sorted, 95),
        p99: percentile(sorted, 99),
    };
}

// Nearest-rank percentile over an ascending array
function percentile(sorted: number[], p: number): number {
    if (sorted.length === 0) return 0;
    const rank = Math.ceil((p / 100) * sorted.length);
    return sorted[Math.min(sorted.length, Math.max(1, rank)) - 1] ?? 0;
}
