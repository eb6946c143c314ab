// src/core/httpServer.ts
import express, {
    type ErrorRequestHandler,
    type Express,
    type Request,
    type RequestHandler,
    type Response,
} from "express";
import type { Server } from "http";
import type { AddressInfo } from "net";
import { randomUUID } from "crypto";
import type { Dependencies } from "./dependencies.js";
import { handleError, runRoute } from "./routeHandler.js";
import type { HttpResult } from "./signalController.js";

export interface HttpServerOptions {
    host: string;
    port: number;
    /** Signal served on the legacy /stream-derivative route */
    defaultSignal: string;
}

/**
 * Express surface: SSE streams, signal control, sample ingest and health.
 */
export class HttpServer {
    private readonly app: Express = express();
    private server: Server | undefined;

    constructor(
        private readonly deps: Dependencies,
        private readonly options: HttpServerOptions
    ) {
        this.setupHttpServer();
    }

    public get application(): Express {
        return this.app;
    }

    public start(): Promise<AddressInfo> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.options.port, this.options.host, () => {
                const address = server.address();
                if (address === null || typeof address === "string") {
                    reject(new Error(`Unexpected server address: ${String(address)}`));
                    return;
                }
                this.deps.logger.info(
                    `HTTP server running at http://${address.address}:${address.port}`
                );
                resolve(address);
            });
            server.once("error", reject);
            this.server = server;
        });
    }

    /**
     * Stop accepting connections. Stream sessions should already be closed
     * by the endpoint's shutdown.
     */
    public stop(): Promise<void> {
        const server = this.server;
        if (!server) return Promise.resolve();
        this.server = undefined;

        return new Promise((resolve, reject) => {
            server.close((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                this.deps.logger.info("HTTP server closed");
                resolve();
            });
            server.closeAllConnections();
        });
    }

    private setupHttpServer(): void {
        const { controller } = this.deps;

        this.app.use(cors);
        this.app.use(express.json({ limit: "1mb" }));

        this.app.get("/signals/:signalId/stream", (req, res) => {
            this.stream(req.params["signalId"] ?? "", req, res);
        });
        this.app.get("/stream-derivative", (req, res) => {
            this.stream(this.options.defaultSignal, req, res);
        });

        this.app.get("/signals", this.route("list_signals", () => controller.listSignals()));
        this.app.post(
            "/signals/:signalId/start",
            this.route("start_signal", (req) => controller.startSignal(req.params["signalId"] ?? ""))
        );
        this.app.post(
            "/signals/:signalId/stop",
            this.route("stop_signal", (req) => controller.stopSignal(req.params["signalId"] ?? ""))
        );
        this.app.post(
            "/signals/:signalId/samples",
            this.route("push_samples", (req) =>
                controller.pushSamples(req.params["signalId"] ?? "", req.body)
            )
        );

        this.app.get("/health", this.route("health_endpoint", () => controller.health()));
        this.app.get("/stats", this.route("stats_endpoint", (_req, correlationId) =>
            controller.stats(correlationId)
        ));
        this.app.get("/metrics", this.route("metrics_endpoint", () => controller.metrics()));

        this.app.use(this.errorHandler);
    }

    private route(
        context: string,
        handler: (req: Request, correlationId: string) => HttpResult | Promise<HttpResult>
    ): RequestHandler {
        return (req, res) => {
            const correlationId = randomUUID();
            void runRoute(this.deps, context, correlationId, () =>
                handler(req, correlationId)
            ).then((result) => this.reply(res, result));
        };
    }

    private stream(signalId: string, req: Request, res: Response): void {
        const target = this.deps.controller.streamTarget(signalId);
        if (!target.ok) {
            this.reply(res, target.result);
            return;
        }
        this.deps.endpoint.handleRequest(target.broker, req, res);
    }

    private reply(res: Response, result: HttpResult): void {
        res.status(result.status);
        if (result.contentType) {
            res.type(result.contentType).send(result.body);
            return;
        }
        res.json(result.body);
    }

    private readonly errorHandler: ErrorRequestHandler = (error: unknown, _req, res, next) => {
        if (res.headersSent) {
            next(error);
            return;
        }
        if (isBodyParseError(error)) {
            res.status(400).json({ status: "error", error: "Malformed JSON body" });
            return;
        }
        const correlationId = randomUUID();
        const err = error instanceof Error ? error : new Error(String(error));
        handleError(this.deps, err, "http_middleware", correlationId);
        res.status(500).json({ status: "error", error: err.message, correlationId });
    };

}

/**
 * Any origin may read the streams and JSON routes
 */
const cors: RequestHandler = (req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Last-Event-ID");
    if (req.method === "OPTIONS") {
        res.sendStatus(204);
        return;
    }
    next();
};

function isBodyParseError(error: unknown): boolean {
    return (
        typeof error === "object" &&
        error !== null &&
        "type" in error &&
        error.type === "entity.parse.failed"
    );
}
