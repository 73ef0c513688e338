/**
 * Environment configuration validation with Zod
 *
 * Provides type-safe configuration from environment variables
 * following 12-Factor App principles.
 *
 * @module @drainguard/core/config
 */

import { z } from "zod";
import type { WrapServerOptions } from "../types.ts";

/**
 * Boolean from string schema (for ENV variables)
 */
export const BooleanFromStringSchema = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default("false")
    .transform((v) => v === "true" || v === "1" || v === "yes");

/**
 * Probe path schema: must start with "/"
 */
export const ProbePathSchema = z.string().startsWith("/", { message: 'Path must start with "/"' });

/**
 * Duration in milliseconds (0 to 5 minutes)
 */
export const DurationMsSchema = z.coerce.number().int().min(0).max(300000);

/**
 * Drainguard environment configuration schema
 *
 * @example
 * ```typescript
 * const config = DrainguardEnvSchema.parse(process.env);
 * console.log(config.READY_PATH); // '/ready' (default)
 * console.log(config.WAIT_BEFORE_SHUTDOWN_MS); // 15000 (default)
 * ```
 */
export const DrainguardEnvSchema = z.object({
    /**
     * Server port
     * @default 5000
     */
    PORT: z.coerce.number().int().min(0).max(65535).default(5000),

    /**
     * Listen address
     * @default '0.0.0.0'
     */
    LISTEN: z.string().default("0.0.0.0"),

    /**
     * Readiness probe path
     * @default '/ready'
     */
    READY_PATH: ProbePathSchema.default("/ready"),

    /**
     * Liveness probe path
     * @default '/health'
     */
    ALIVE_PATH: ProbePathSchema.default("/health"),

    /**
     * Grace period with readiness reported false before closing
     * @default 15000
     */
    WAIT_BEFORE_SHUTDOWN_MS: DurationMsSchema.default(15000),

    /**
     * Bound on waiting for in-flight requests once closing starts
     * @default 5000
     */
    SHUTDOWN_TIMEOUT_MS: DurationMsSchema.default(5000),

    /**
     * Shut down on SIGTERM/SIGINT
     * @default false
     */
    AUTO_SHUTDOWN: BooleanFromStringSchema,
});

/**
 * Drainguard environment configuration type
 */
export type DrainguardEnv = z.infer<typeof DrainguardEnvSchema>;

/**
 * Parse and validate environment configuration
 *
 * @example
 * ```typescript
 * const config = parseEnvConfig();
 * // or with custom env
 * const config = parseEnvConfig({ WAIT_BEFORE_SHUTDOWN_MS: '2000' });
 * ```
 */
export function parseEnvConfig(env: Record<string, string | undefined> = process.env): DrainguardEnv {
    return DrainguardEnvSchema.parse(env);
}

/**
 * Safely parse environment configuration (returns result object)
 *
 * @example
 * ```typescript
 * const result = safeParseEnvConfig();
 * if (result.success) {
 *   console.log(result.data.READY_PATH);
 * } else {
 *   console.error(result.error.format());
 * }
 * ```
 */
export function safeParseEnvConfig(env: Record<string, string | undefined> = process.env) {
    return DrainguardEnvSchema.safeParse(env);
}

/**
 * Map parsed environment configuration to wrapServer options
 *
 * @example
 * ```typescript
 * const server = wrapServer(httpServer, wrapOptionsFromEnv(parseEnvConfig()));
 * ```
 */
export function wrapOptionsFromEnv(config: DrainguardEnv): WrapServerOptions {
    return {
        readyPath: config.READY_PATH,
        alivePath: config.ALIVE_PATH,
        waitBeforeShutdown: config.WAIT_BEFORE_SHUTDOWN_MS,
        shutdownTimeout: config.SHUTDOWN_TIMEOUT_MS,
        autoShutdown: config.AUTO_SHUTDOWN,
    };
}
