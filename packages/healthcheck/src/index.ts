/**
 * @module @drainguard/healthcheck
 */

// Readiness flag
export { createReadinessFlag, ReadinessFlag } from "./ReadinessFlag.ts";

// Routing
export { ServeMux } from "./ServeMux.ts";
export { bindHealthEndpoints, DEFAULT_ALIVE_PATH, DEFAULT_READY_PATH } from "./httpHandler.ts";

// Types
export {
    isReadinessSetter,
    toRequestHandler,
    type HandlerObject,
    type HealthEndpointsOptions,
    type HealthHandler,
    type ReadinessSetter,
    type RequestHandler,
} from "./types.ts";
