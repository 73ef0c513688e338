/**
 * Wrapped server
 *
 * Puts readiness/liveness probes in front of an HTTP server and runs its
 * listener in the background. Shutdown is delegated to ShutdownCoordinator.
 *
 * @module WrappedServer
 */

import { EventEmitter } from "node:events";
import { bindHealthEndpoints, createReadinessFlag, DEFAULT_ALIVE_PATH, DEFAULT_READY_PATH } from "@drainguard/healthcheck";
import { toError } from "./errors.ts";
import { getLogger } from "./logger.ts";
import { assertDuration, ShutdownCoordinator } from "./ShutdownCoordinator.ts";
import type { HttpServer, ListenOutcome, WrappedServer, WrapServerConfig, WrapServerOptions } from "./types.ts";
import { LifecycleEvent, ShutdownState } from "./types.ts";

const logger = getLogger("drainguard.server");

const DEFAULT_WAIT_BEFORE_SHUTDOWN = 15_000;
const DEFAULT_SHUTDOWN_TIMEOUT = 5_000;
const DEFAULT_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

/**
 * Events emitted on state transitions
 */
const STATE_EVENTS = new Map<ShutdownState, LifecycleEvent>([
    [ShutdownState.DRAINING_ANNOUNCED, LifecycleEvent.DRAINING],
    [ShutdownState.CLOSING, LifecycleEvent.CLOSING],
    [ShutdownState.CLOSED, LifecycleEvent.CLOSE],
]);

/**
 * Apply defaults to wrapServer options and freeze the result.
 *
 * Each default probe handler is its own ReadinessFlag, so flipping
 * readiness never touches liveness.
 *
 * @throws {Error} If a duration is negative, not finite, or too long for a timer
 */
export function resolveConfig(options: WrapServerOptions = {}): WrapServerConfig {
    const config: WrapServerConfig = {
        readyPath: options.readyPath ?? DEFAULT_READY_PATH,
        readyHandler: options.readyHandler ?? createReadinessFlag(),
        alivePath: options.alivePath ?? DEFAULT_ALIVE_PATH,
        aliveHandler: options.aliveHandler ?? createReadinessFlag(),
        waitBeforeShutdown: options.waitBeforeShutdown ?? DEFAULT_WAIT_BEFORE_SHUTDOWN,
        shutdownTimeout: options.shutdownTimeout ?? DEFAULT_SHUTDOWN_TIMEOUT,
        autoShutdown: options.autoShutdown ?? false,
        signals: Object.freeze([...(options.signals ?? DEFAULT_SIGNALS)]),
    };

    assertDuration("waitBeforeShutdown", config.waitBeforeShutdown);
    assertDuration("shutdownTimeout", config.shutdownTimeout);

    return Object.freeze(config);
}

/**
 * Wrapped server implementation class
 *
 * Use wrapServer() to create instances.
 */
class WrappedServerImpl extends EventEmitter implements WrappedServer {
    private readonly _server: HttpServer;
    private readonly _config: WrapServerConfig;
    private readonly _coordinator: ShutdownCoordinator;
    private readonly _terminated: Promise<ListenOutcome>;
    private readonly _resolveTerminated: (outcome: ListenOutcome) => void;
    private readonly _signalHandlers = new Map<NodeJS.Signals, () => void>();

    constructor(server: HttpServer, options: WrapServerOptions) {
        super();
        this._server = server;
        this._config = resolveConfig(options);

        let resolveTerminated: (outcome: ListenOutcome) => void = () => {};
        this._terminated = new Promise<ListenOutcome>((resolve) => {
            resolveTerminated = resolve;
        });
        this._resolveTerminated = resolveTerminated;

        this._coordinator = new ShutdownCoordinator(server, this._config.readyHandler, this._terminated, {
            waitBeforeShutdown: this._config.waitBeforeShutdown,
            shutdownTimeout: this._config.shutdownTimeout,
            onStateChange: (state) => this._onStateChange(state),
        });
    }

    get state(): ShutdownState {
        return this._coordinator.state;
    }

    get config(): WrapServerConfig {
        return this._config;
    }

    get server(): HttpServer {
        return this._server;
    }

    get terminated(): Promise<ListenOutcome> {
        return this._terminated;
    }

    listenAndServe(): void {
        const { readyPath, readyHandler, alivePath, aliveHandler } = this._config;

        // The wrapped handler becomes the catch-all route
        this._server.handler = bindHealthEndpoints({
            readyPath,
            readyHandler,
            alivePath,
            aliveHandler,
            handler: this._server.handler,
        });

        this._setupAutoShutdown();
        logger.info(`Serving readiness on ${readyPath}, liveness on ${alivePath}`);

        void this._server.listen().then(
            () => {
                this._resolveTerminated({ ok: true });
            },
            (err: unknown) => {
                const error = toError(err);
                logger.error(`Server stopped with error: ${error.message}`);
                this._resolveTerminated({ ok: false, error });
                this.emit(LifecycleEvent.FAILED, error);
            },
        );
    }

    shutdown(signal?: AbortSignal): Promise<void> {
        this._removeAutoShutdown();
        return this._coordinator.shutdown(signal);
    }

    private _onStateChange(state: ShutdownState): void {
        logger.debug(`Shutdown state: ${state}`);
        const event = STATE_EVENTS.get(state);
        if (event) {
            this.emit(event);
        }
    }

    private _setupAutoShutdown(): void {
        if (!this._config.autoShutdown) {
            return;
        }

        for (const signal of this._config.signals) {
            const handler = () => {
                logger.info(`Received ${signal}, initiating graceful shutdown...`);
                this.shutdown().catch((err: unknown) => {
                    logger.error(`Shutdown after ${signal} failed: ${toError(err).message}`);
                });
            };

            this._signalHandlers.set(signal, handler);
            process.on(signal, handler);
        }
    }

    private _removeAutoShutdown(): void {
        for (const [signal, handler] of this._signalHandlers) {
            process.removeListener(signal, handler);
        }
        this._signalHandlers.clear();
    }
}

/**
 * Wrap an HTTP server with readiness/liveness probes and coordinated shutdown
 *
 * Defaults: readiness on `/ready`, liveness on `/health`, 15s grace period,
 * then 5s for in-flight requests before the server is force-closed.
 * Once wrapped, the server's handler must not be changed directly.
 *
 * @param server - HTTP server; its current handler serves all non-probe paths
 * @param options - Paths, handlers and timings
 * @returns Wrapped server, not yet listening
 *
 * @example
 * ```typescript
 * import { NodeHttpServer, wrapServer } from '@drainguard/core';
 *
 * const server = wrapServer(new NodeHttpServer({ handler: app }), {
 *   waitBeforeShutdown: 10_000,
 *   autoShutdown: true,
 * });
 *
 * server.on('close', () => console.log('closed'));
 * server.listenAndServe();
 * ```
 */
export function wrapServer(server: HttpServer, options: WrapServerOptions = {}): WrappedServer {
    return new WrappedServerImpl(server, options);
}
