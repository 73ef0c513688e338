import assert from "node:assert";
import { describe, it } from "node:test";
import { bindHealthEndpoints, DEFAULT_ALIVE_PATH, DEFAULT_READY_PATH } from "../../src/httpHandler.ts";
import { ReadinessFlag } from "../../src/ReadinessFlag.ts";
import type { HealthEndpointsOptions } from "../../src/types.ts";
import { createRecordingHandler, dispatch } from "../helpers/mock-http.ts";

function createOptions(overrides: Partial<HealthEndpointsOptions> = {}): HealthEndpointsOptions {
    return {
        readyPath: DEFAULT_READY_PATH,
        readyHandler: new ReadinessFlag(),
        alivePath: DEFAULT_ALIVE_PATH,
        aliveHandler: new ReadinessFlag(),
        handler: createRecordingHandler(418),
        ...overrides,
    };
}

describe("bindHealthEndpoints", () => {
    it("should use /ready and /health as default paths", () => {
        assert.strictEqual(DEFAULT_READY_PATH, "/ready");
        assert.strictEqual(DEFAULT_ALIVE_PATH, "/health");
    });

    it("should return 200 on both probes when flags are set", () => {
        const handler = bindHealthEndpoints(createOptions());

        assert.strictEqual(dispatch(handler, "/ready").statusCode, 200);
        assert.strictEqual(dispatch(handler, "/health").statusCode, 200);
    });

    it("should report readiness and liveness independently", () => {
        const readyHandler = new ReadinessFlag();
        const aliveHandler = new ReadinessFlag();
        const handler = bindHealthEndpoints(createOptions({ readyHandler, aliveHandler }));

        readyHandler.setReady(false);

        assert.strictEqual(dispatch(handler, "/ready").statusCode, 503);
        assert.strictEqual(dispatch(handler, "/health").statusCode, 200);
    });

    it("should forward every other path to the application handler", () => {
        const app = createRecordingHandler(418);
        const handler = bindHealthEndpoints(createOptions({ handler: app }));

        assert.strictEqual(dispatch(handler, "/").statusCode, 418);
        assert.strictEqual(dispatch(handler, "/api/users?page=2").statusCode, 418);
        assert.strictEqual(dispatch(handler, "/ready/extra").statusCode, 418);
        assert.deepStrictEqual(app.paths, ["/", "/api/users?page=2", "/ready/extra"]);
    });

    it("should not forward probe requests to the application", () => {
        const app = createRecordingHandler(418);
        const handler = bindHealthEndpoints(createOptions({ handler: app }));

        dispatch(handler, "/ready");
        dispatch(handler, "/health");

        assert.deepStrictEqual(app.paths, []);
    });

    it("should serve custom paths", () => {
        const app = createRecordingHandler(418);
        const handler = bindHealthEndpoints(createOptions({ readyPath: "/readyz", alivePath: "/livez", handler: app }));

        assert.strictEqual(dispatch(handler, "/readyz").statusCode, 200);
        assert.strictEqual(dispatch(handler, "/livez").statusCode, 200);
        assert.strictEqual(dispatch(handler, "/ready").statusCode, 418);
    });

    it("should use custom function handlers", () => {
        const custom = createRecordingHandler(299);
        const handler = bindHealthEndpoints(createOptions({ readyHandler: custom }));

        assert.strictEqual(dispatch(handler, "/ready").statusCode, 299);
    });

    describe("path collisions", () => {
        it("should serve the liveness handler when both probes share a path", () => {
            const readyHandler = new ReadinessFlag();
            const aliveHandler = new ReadinessFlag(false);
            const handler = bindHealthEndpoints(createOptions({ readyPath: "/probe", readyHandler, alivePath: "/probe", aliveHandler }));

            assert.strictEqual(dispatch(handler, "/probe").statusCode, 503);
        });

        it("should let the application shadow a probe registered at /", () => {
            const app = createRecordingHandler(418);
            const handler = bindHealthEndpoints(createOptions({ readyPath: "/", handler: app }));

            assert.strictEqual(dispatch(handler, "/").statusCode, 418);
        });
    });
});
