/**
 * Public API types for wrapServer
 *
 * @module types
 */

import type { EventEmitter } from "node:events";
import type { HealthHandler, RequestHandler } from "@drainguard/healthcheck";

// =============================================================================
// HTTP SERVER CONTRACT
// =============================================================================

/**
 * HTTP server collaborator
 *
 * The minimal surface wrapServer needs from an HTTP server. `NodeHttpServer`
 * implements it over `node:http`; tests and other transports can provide
 * their own.
 */
export interface HttpServer {
    /**
     * Request handler, read for every request.
     *
     * Owned by the wrapper once `listenAndServe()` has been called.
     */
    handler: RequestHandler;

    /**
     * Start listening.
     *
     * Settles once, when the server stops: resolves on normal closure,
     * rejects on start-up or runtime failure.
     */
    listen(): Promise<void>;

    /**
     * Stop accepting connections and wait for in-flight requests.
     *
     * Must reject with a deadline-exceeded error (see `isDeadlineExceededError`)
     * when `signal` aborts before the server has closed.
     */
    shutdown(signal: AbortSignal): Promise<void>;

    /**
     * Close every connection immediately and resolve once the server is closed.
     */
    forceClose(): Promise<void>;
}

/**
 * Terminal result of the background listen task
 */
export type ListenOutcome = { readonly ok: true } | { readonly ok: false; readonly error: Error };

// =============================================================================
// SHUTDOWN STATE MACHINE
// =============================================================================

/**
 * Shutdown coordinator states
 *
 * serving -> draining_announced -> draining_grace -> closing -> closed,
 * or serving -> failed_to_start when the listener ends with an error first.
 */
export const ShutdownState = {
    /** Listening (or about to); shutdown not requested */
    SERVING: "serving",
    /** Readiness reported false */
    DRAINING_ANNOUNCED: "draining_announced",
    /** Waiting for the grace period, the caller's signal, or the listener to end */
    DRAINING_GRACE: "draining_grace",
    /** Graceful close in progress, bounded by the shutdown timeout */
    CLOSING: "closing",
    /** Server closed */
    CLOSED: "closed",
    /** Listener ended with an error */
    FAILED_TO_START: "failed_to_start",
} as const;

export type ShutdownState = (typeof ShutdownState)[keyof typeof ShutdownState];

/**
 * Lifecycle event names emitted by WrappedServer
 */
export const LifecycleEvent = {
    /** Readiness flipped, grace period started */
    DRAINING: "draining",
    /** Graceful close started */
    CLOSING: "closing",
    /** Server closed */
    CLOSE: "close",
    /** Listener ended with an error */
    FAILED: "failed",
} as const;

export type LifecycleEvent = (typeof LifecycleEvent)[keyof typeof LifecycleEvent];

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Options for wrapServer()
 */
export interface WrapServerOptions {
    /**
     * Readiness probe path
     * @default "/ready"
     */
    readyPath?: string;

    /**
     * Readiness probe handler. Told `setReady(false)` at shutdown when it
     * implements the ReadinessSetter capability.
     * @default new ReadinessFlag()
     */
    readyHandler?: HealthHandler;

    /**
     * Liveness probe path
     * @default "/health"
     */
    alivePath?: string;

    /**
     * Liveness probe handler
     * @default new ReadinessFlag()
     */
    aliveHandler?: HealthHandler;

    /**
     * Milliseconds to keep serving with readiness reported false before
     * closing, so probe pollers can stop routing traffic here.
     * @default 15000
     */
    waitBeforeShutdown?: number;

    /**
     * Milliseconds to wait for in-flight requests once closing starts,
     * counted from the end of the grace period. The server is force-closed
     * afterwards.
     * @default 5000
     */
    shutdownTimeout?: number;

    /**
     * Shut down automatically when the process receives one of `signals`
     * @default false
     */
    autoShutdown?: boolean;

    /**
     * Signals that trigger automatic shutdown
     * @default ["SIGTERM", "SIGINT"]
     */
    signals?: NodeJS.Signals[];
}

/**
 * Resolved, immutable wrapServer configuration
 */
export interface WrapServerConfig {
    readonly readyPath: string;
    readonly readyHandler: HealthHandler;
    readonly alivePath: string;
    readonly aliveHandler: HealthHandler;
    readonly waitBeforeShutdown: number;
    readonly shutdownTimeout: number;
    readonly autoShutdown: boolean;
    readonly signals: ReadonlyArray<NodeJS.Signals>;
}

// =============================================================================
// WRAPPED SERVER API
// =============================================================================

/**
 * HTTP server with readiness/liveness probes and coordinated shutdown
 *
 * @example
 * ```typescript
 * import { NodeHttpServer, wrapServer } from '@drainguard/core';
 *
 * const server = wrapServer(new NodeHttpServer({ handler: app, port: 8080 }));
 * server.listenAndServe();
 *
 * process.once('SIGTERM', () => {
 *   server.shutdown(AbortSignal.timeout(30_000)).catch((err) => {
 *     console.error(err);
 *     process.exitCode = 1;
 *   });
 * });
 * ```
 */
export interface WrappedServer extends EventEmitter {
    /**
     * Install the probe routes and start listening in the background.
     *
     * Not guarded against repeated calls.
     */
    listenAndServe(): void;

    /**
     * Drain and close the server.
     *
     * Resolves when the server closed (gracefully or by force), rejects with
     * the listener's error if it had already failed, or with any
     * non-deadline error from the graceful close. Repeated calls share the
     * first call's result.
     *
     * @param signal - Caller deadline; cuts the grace period short when it aborts
     */
    shutdown(signal?: AbortSignal): Promise<void>;

    /**
     * Current shutdown state
     */
    readonly state: ShutdownState;

    /**
     * Resolved configuration
     */
    readonly config: WrapServerConfig;

    /**
     * Wrapped HTTP server
     */
    readonly server: HttpServer;

    /**
     * Settles with the background listen task's outcome. Never rejects.
     */
    readonly terminated: Promise<ListenOutcome>;

    on(event: "draining", listener: () => void): this;
    on(event: "closing", listener: () => void): this;
    on(event: "close", listener: () => void): this;
    on(event: "failed", listener: (error: Error) => void): this;

    once(event: "draining", listener: () => void): this;
    once(event: "closing", listener: () => void): this;
    once(event: "close", listener: () => void): this;
    once(event: "failed", listener: (error: Error) => void): this;

    off(event: "draining", listener: () => void): this;
    off(event: "closing", listener: () => void): this;
    off(event: "close", listener: () => void): this;
    off(event: "failed", listener: (error: Error) => void): this;
}
