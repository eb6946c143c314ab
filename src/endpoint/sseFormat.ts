// src/endpoint/sseFormat.ts

import type { StreamEvent } from "../types/streamTypes.js";

export const TERMINAL_EVENT_NAME = "terminal";

/**
 * Frame a stream event as one Server-Sent Events message.
 * Points carry only `{x, y}` in their data line.
 */
export function formatSseEvent(event: StreamEvent): string {
    if (event.type === "point") {
        const data = JSON.stringify({ x: event.point.x, y: event.point.y });
        return `id: ${event.seq}\ndata: ${data}\n\n`;
    }
    const data = JSON.stringify({
        reason: event.reason,
        message: event.message,
    });
    return `event: ${TERMINAL_EVENT_NAME}\ndata: ${data}\n\n`;
}

export function formatRetryHint(retryMs: number): string {
    return `retry: ${Math.max(0, Math.round(retryMs))}\n\n`;
}

export const KEEPALIVE_COMMENT = ": keepalive\n\n";
