import { describe, it, expect, vi, beforeEach } from "vitest";
import type { MockInstance } from "vitest";
import { Logger } from "../src/infrastructure/logger.js";

function parsedLine(spy: MockInstance<typeof console.log>, index = 0): unknown {
    return JSON.parse(String(spy.mock.calls[index]?.[0]));
}

describe("infrastructure/logger", () => {
    let spy: MockInstance<typeof console.log>;

    beforeEach(() => {
        spy = vi.spyOn(console, "log").mockImplementation(() => {});
    });

    it("logs json when pretty is false", () => {
        const logger = new Logger(false);
        logger.info("test", { a: 1 }, "id");

        expect(spy).toHaveBeenCalledTimes(1);
        expect(parsedLine(spy)).toMatchObject({
            level: "INFO",
            message: "test",
            a: 1,
            correlationId: "id",
        });
    });

    it("adds the correlation scope registered for an id", () => {
        const logger = new Logger(false);
        logger.setCorrelationId("req-1", "stats_endpoint");
        logger.warn("slow", undefined, "req-1");
        logger.removeCorrelationId("req-1");
        logger.warn("slow again", undefined, "req-1");

        expect(parsedLine(spy, 0)).toMatchObject({ correlationScope: "stats_endpoint" });
        expect(parsedLine(spy, 1)).not.toHaveProperty("correlationScope");
    });

    it("serializes errors in the context", () => {
        const logger = new Logger(false);
        logger.error("failed", { error: new Error("boom") });

        expect(parsedLine(spy)).toMatchObject({
            level: "ERROR",
            error: { name: "Error", message: "boom" },
        });
    });

    it("drops entries below the minimum level", () => {
        const logger = new Logger(false, "warn");
        logger.debug("hidden");
        logger.info("hidden");
        logger.warn("shown");

        expect(spy).toHaveBeenCalledTimes(1);
        expect(logger.isDebugEnabled()).toBe(false);
        expect(new Logger(false, "debug").isDebugEnabled()).toBe(true);
    });

    it("logs formatted output when pretty is true", () => {
        const logger = new Logger(true);
        logger.error("oops");

        expect(spy).toHaveBeenCalledWith("[ERROR] oops", "");
    });
});
