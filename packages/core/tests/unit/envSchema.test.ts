import assert from "node:assert";
import { describe, it } from "node:test";
import { parseEnvConfig, safeParseEnvConfig, wrapOptionsFromEnv } from "../../src/config/envSchema.ts";

describe("parseEnvConfig", () => {
    it("should apply defaults for an empty environment", () => {
        const config = parseEnvConfig({});

        assert.deepStrictEqual(config, {
            PORT: 5000,
            LISTEN: "0.0.0.0",
            READY_PATH: "/ready",
            ALIVE_PATH: "/health",
            WAIT_BEFORE_SHUTDOWN_MS: 15000,
            SHUTDOWN_TIMEOUT_MS: 5000,
            AUTO_SHUTDOWN: false,
        });
    });

    it("should coerce numeric values", () => {
        const config = parseEnvConfig({ PORT: "8080", WAIT_BEFORE_SHUTDOWN_MS: "2500", SHUTDOWN_TIMEOUT_MS: "0" });

        assert.strictEqual(config.PORT, 8080);
        assert.strictEqual(config.WAIT_BEFORE_SHUTDOWN_MS, 2500);
        assert.strictEqual(config.SHUTDOWN_TIMEOUT_MS, 0);
    });

    it("should parse boolean strings", () => {
        assert.strictEqual(parseEnvConfig({ AUTO_SHUTDOWN: "yes" }).AUTO_SHUTDOWN, true);
        assert.strictEqual(parseEnvConfig({ AUTO_SHUTDOWN: "1" }).AUTO_SHUTDOWN, true);
        assert.strictEqual(parseEnvConfig({ AUTO_SHUTDOWN: "no" }).AUTO_SHUTDOWN, false);
    });

    it("should accept custom probe paths", () => {
        const config = parseEnvConfig({ READY_PATH: "/readyz", ALIVE_PATH: "/livez" });

        assert.strictEqual(config.READY_PATH, "/readyz");
        assert.strictEqual(config.ALIVE_PATH, "/livez");
    });

    it("should reject probe paths without a leading slash", () => {
        assert.throws(() => parseEnvConfig({ READY_PATH: "ready" }), /Path must start with "\/"/);
    });

    it("should reject negative durations", () => {
        assert.throws(() => parseEnvConfig({ SHUTDOWN_TIMEOUT_MS: "-1" }));
    });
});

describe("safeParseEnvConfig", () => {
    it("should return success for a valid environment", () => {
        const result = safeParseEnvConfig({ PORT: "3000" });

        assert.strictEqual(result.success, true);
        assert.strictEqual(result.data?.PORT, 3000);
    });

    it("should return failure for an invalid port", () => {
        const result = safeParseEnvConfig({ PORT: "not-a-port" });

        assert.strictEqual(result.success, false);
    });

    it("should return failure for an unknown boolean", () => {
        const result = safeParseEnvConfig({ AUTO_SHUTDOWN: "maybe" });

        assert.strictEqual(result.success, false);
    });
});

describe("wrapOptionsFromEnv", () => {
    it("should map configuration to wrapServer options", () => {
        const options = wrapOptionsFromEnv(
            parseEnvConfig({ READY_PATH: "/readyz", ALIVE_PATH: "/livez", WAIT_BEFORE_SHUTDOWN_MS: "1000", SHUTDOWN_TIMEOUT_MS: "250", AUTO_SHUTDOWN: "true" }),
        );

        assert.deepStrictEqual(options, {
            readyPath: "/readyz",
            alivePath: "/livez",
            waitBeforeShutdown: 1000,
            shutdownTimeout: 250,
            autoShutdown: true,
        });
    });
});
