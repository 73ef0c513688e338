/**
 * Health endpoint types
 *
 * @module @drainguard/healthcheck/types
 */

import type { IncomingMessage, ServerResponse } from "node:http";

/**
 * Plain Node.js request handler
 */
export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => void;

/**
 * Object form of a request handler
 */
export interface HandlerObject {
    handle(req: IncomingMessage, res: ServerResponse): void;
}

/**
 * Anything that can serve a health endpoint: a function or an object with `handle()`
 */
export type HealthHandler = RequestHandler | HandlerObject;

/**
 * Settable readiness capability
 *
 * Handlers that implement it are told to report "not ready" when
 * graceful shutdown begins. Handlers without it are left alone.
 */
export interface ReadinessSetter {
    setReady(ready: boolean): void;
}

/**
 * Type guard for the settable readiness capability.
 *
 * Works for both function and object handlers.
 */
export function isReadinessSetter(value: unknown): value is ReadinessSetter {
    if (value == null || (typeof value !== "object" && typeof value !== "function")) return false;
    return "setReady" in value && typeof value.setReady === "function";
}

/**
 * Normalize a health handler to a plain request handler
 */
export function toRequestHandler(handler: HealthHandler): RequestHandler {
    if (typeof handler === "function") {
        return handler;
    }
    return (req, res) => handler.handle(req, res);
}

/**
 * Options for binding health endpoints in front of an application handler
 */
export interface HealthEndpointsOptions {
    /** Path served by `readyHandler` */
    readyPath: string;

    /** Readiness handler */
    readyHandler: HealthHandler;

    /** Path served by `aliveHandler` */
    alivePath: string;

    /** Liveness handler */
    aliveHandler: HealthHandler;

    /** Application handler, receives every other path */
    handler: RequestHandler;
}
