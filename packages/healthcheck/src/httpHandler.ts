/**
 * Health endpoint binder
 *
 * Puts the readiness and liveness endpoints in front of an application
 * handler. Everything that is not a probe path falls through to the
 * application unchanged.
 *
 * @module @drainguard/healthcheck/httpHandler
 */

import { ServeMux } from "./ServeMux.ts";
import type { HealthEndpointsOptions, RequestHandler } from "./types.ts";
import { toRequestHandler } from "./types.ts";

/**
 * Default readiness probe path
 */
export const DEFAULT_READY_PATH = "/ready";

/**
 * Default liveness probe path
 */
export const DEFAULT_ALIVE_PATH = "/health";

/**
 * Build the request handler that serves both probes and the application
 *
 * Registration order is readiness, liveness, then the application at "/".
 * Colliding paths are not rejected: the later registration wins, so equal
 * probe paths serve the liveness handler and a probe path of "/" is
 * shadowed by the application.
 *
 * @example
 * ```typescript
 * const handler = bindHealthEndpoints({
 *   readyPath: '/ready',
 *   readyHandler: createReadinessFlag(),
 *   alivePath: '/health',
 *   aliveHandler: createReadinessFlag(),
 *   handler: app,
 * });
 * http.createServer(handler);
 * ```
 */
export function bindHealthEndpoints(options: HealthEndpointsOptions): RequestHandler {
    const mux = new ServeMux();

    mux.register(options.readyPath, options.readyHandler);
    mux.register(options.alivePath, options.aliveHandler);
    mux.register("/", options.handler);

    return toRequestHandler(mux);
}
