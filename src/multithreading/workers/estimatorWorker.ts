// src/multithreading/workers/estimatorWorker.ts
import { parentPort, workerData } from "worker_threads";
import { runEstimatorWorker } from "../estimatorWorkerRuntime.js";

const port = parentPort;
if (!port) {
    console.error("EstimatorWorker must be run in a worker thread");
    process.exit(1);
}

void runEstimatorWorker(port, workerData).then(() => port.close());
