// __mocks__/src/infrastructure/loggerInterface.ts
import { vi } from "vitest";
import type { ILogger } from "../../../src/infrastructure/loggerInterface.js";

/**
 * Silent logger whose methods are spies. Read calls back with `vi.mocked`.
 */
export const createMockLogger = (debugEnabled = false): ILogger => {
    const mockLogger: ILogger = {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
        isDebugEnabled: vi.fn(() => debugEnabled),
        setCorrelationId: vi.fn(),
        removeCorrelationId: vi.fn(),
    };

    return mockLogger;
};
