// src/utils/productionUtils.ts
import { setImmediate as nextTick, setTimeout as delay } from "node:timers/promises";

export class ProductionUtils {
    /**
     * Async sleep. Rejects with an AbortError when the signal fires first.
     */
    public static async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        if (ms <= 0 && !signal) return;
        await delay(Math.max(0, ms), undefined, { signal });
    }

    /**
     * Let queued I/O and timers run before continuing a hot loop
     */
    public static async yieldToEventLoop(): Promise<void> {
        await nextTick();
    }

    public static isAbortError(error: unknown): boolean {
        return error instanceof Error && error.name === "AbortError";
    }
}
