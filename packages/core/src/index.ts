/**
 * @drainguard/core
 *
 * Main entry point for drainguard.
 *
 * Provides:
 * - wrapServer: Adds readiness/liveness probes and coordinated shutdown to an HTTP server
 * - NodeHttpServer: HttpServer implementation over node:http
 * - ShutdownCoordinator: The shutdown state machine, usable on its own
 * - Configuration: Environment parsing
 *
 * @module @drainguard/core
 */

// =============================================================================
// SERVER API
// =============================================================================

export { resolveConfig, wrapServer } from "./WrappedServer.ts";
export { NodeHttpServer, type NodeHttpServerOptions } from "./NodeHttpServer.ts";
export { assertDuration, MAX_DURATION_MS, ShutdownCoordinator, type ShutdownCoordinatorOptions } from "./ShutdownCoordinator.ts";

// =============================================================================
// ERRORS & LOGGING
// =============================================================================

export { DeadlineExceededError, isDeadlineExceededError, toError } from "./errors.ts";
export { getLogger, type Logger, type LoggerOptions } from "./logger.ts";

// =============================================================================
// TYPES
// =============================================================================

export { LifecycleEvent, ShutdownState } from "./types.ts";

export type { HttpServer, ListenOutcome, WrappedServer, WrapServerConfig, WrapServerOptions } from "./types.ts";

// Probe building blocks
export { createReadinessFlag, isReadinessSetter, ReadinessFlag } from "@drainguard/healthcheck";
export type { HealthHandler, ReadinessSetter, RequestHandler } from "@drainguard/healthcheck";

// =============================================================================
// CONFIGURATION
// =============================================================================

export {
    DrainguardEnvSchema,
    BooleanFromStringSchema,
    DurationMsSchema,
    ProbePathSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    wrapOptionsFromEnv,
    type DrainguardEnv,
} from "./config/index.ts";
