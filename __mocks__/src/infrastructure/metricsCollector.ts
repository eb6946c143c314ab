// __mocks__/src/infrastructure/metricsCollector.ts
import { vi } from "vitest";
import type { IMetricsRecorder } from "../../../src/infrastructure/metricsCollectorInterface.js";

/**
 * Recorder whose methods are spies, for components that only write metrics
 */
export const createMockMetrics = (): IMetricsRecorder => ({
    incrementCounter: vi.fn(),
    setGauge: vi.fn(),
    recordHistogram: vi.fn(),
});
