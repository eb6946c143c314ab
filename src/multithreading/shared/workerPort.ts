// src/multithreading/shared/workerPort.ts

/**
 * The part of `parentPort` the worker-side proxies need
 */
export interface WorkerPort {
    postMessage(value: unknown): void;
}

/**
 * `parentPort` as seen by the estimator worker runtime
 */
export interface WorkerChannel extends WorkerPort {
    on(event: "message", listener: (message: unknown) => void): unknown;
    close(): void;
}
