/**
 * Configuration module
 *
 * Provides type-safe environment configuration validation
 * using Zod schemas. Follows 12-Factor App principles.
 *
 * @example
 * ```typescript
 * import { parseEnvConfig, wrapOptionsFromEnv } from '@drainguard/core';
 *
 * const config = parseEnvConfig();
 * const server = wrapServer(new NodeHttpServer({ handler: app, port: config.PORT, host: config.LISTEN }), wrapOptionsFromEnv(config));
 * ```
 *
 * @module @drainguard/core/config
 */

export {
    DrainguardEnvSchema,
    BooleanFromStringSchema,
    DurationMsSchema,
    ProbePathSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    wrapOptionsFromEnv,
    type DrainguardEnv,
} from "./envSchema.ts";
