// test/vitest.setup.ts
import { EventEmitter } from "events";
import { afterEach, vi } from "vitest";

// Broker and session tests attach many listeners to one fake transport
EventEmitter.defaultMaxListeners = 20;

afterEach(() => {
    // Restore real timers after each test
    vi.useRealTimers();
});
