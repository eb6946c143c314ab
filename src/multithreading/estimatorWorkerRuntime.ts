// src/multithreading/estimatorWorkerRuntime.ts
import { SignalPipeline, type PipelineOutcome } from "../pipeline/signalPipeline.js";
import { createSampleSource } from "../sources/index.js";
import {
    StopMessageSchema,
    WorkerInitDataSchema,
} from "./shared/messageSchemas.js";
import { WorkerMetricsProxy } from "./shared/workerMetricsProxy.js";
import { WorkerPointSink } from "./shared/workerPointSink.js";
import { WorkerProxyLogger } from "./shared/workerProxyLogger.js";
import type { WorkerChannel } from "./shared/workerPort.js";

/**
 * Body of the estimator worker. Runs one signal's pipeline against proxies
 * that post everything back over `channel`, then reports how it ended.
 *
 * Never rejects: a crash is reported as a `pipeline_error` message.
 */
export async function runEstimatorWorker(
    channel: WorkerChannel,
    rawInitData: unknown
): Promise<PipelineOutcome | undefined> {
    const parsed = WorkerInitDataSchema.safeParse(rawInitData);
    if (!parsed.success) {
        channel.postMessage({
            type: "pipeline_error",
            message: `Invalid worker init data: ${parsed.error.message}`,
        });
        return undefined;
    }

    const { signalId, source, settings, debugLogging } = parsed.data;
    const logger = new WorkerProxyLogger(
        `estimator:${signalId}`,
        channel,
        debugLogging
    );
    const metrics = new WorkerMetricsProxy(channel);
    const sink = new WorkerPointSink(channel);

    try {
        const pipeline = new SignalPipeline(
            signalId,
            createSampleSource(source),
            sink,
            settings,
            logger,
            metrics
        );

        channel.on("message", (message) => {
            if (!StopMessageSchema.safeParse(message).success) {
                logger.warn("Unknown message from parent", { message });
                return;
            }
            pipeline.stop().catch((error: unknown) => {
                logger.error("Failed to stop pipeline", { signalId, error });
            });
        });

        const outcome = await pipeline.run();
        channel.postMessage({
            type: "pipeline_exit",
            outcome,
            stats: pipeline.getStats(),
        });
        return outcome;
    } catch (error) {
        channel.postMessage({
            type: "pipeline_error",
            message: error instanceof Error ? error.message : String(error),
        });
        return undefined;
    }
}
