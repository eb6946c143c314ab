// src/pipeline/dispatcher.ts

export type DispatchMode = "inline" | "worker";

export type DispatchState =
    | "idle"
    | "running"
    | "stopping"
    | "stopped"
    | "completed"
    | "failed";

/**
 * Execution boundary that hosts one signal's pipeline. Output only ever
 * reaches the rest of the process through the signal's broker.
 */
export interface Dispatcher {
    readonly mode: DispatchMode;
    readonly state: DispatchState;
    /** Begin a fresh dispatch. Throws when one is already running. */
    start(): void;
    /** Stop ingestion and wait for the execution context to wind down. */
    stop(): Promise<void>;
}

export class DispatchInProgressError extends Error {
    constructor(public readonly signalId: string) {
        super(`Signal ${signalId} is already running`);
        this.name = "DispatchInProgressError";
    }
}

export function isActive(state: DispatchState): boolean {
    return state === "running" || state === "stopping";
}
