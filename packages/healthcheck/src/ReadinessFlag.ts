/**
 * Readiness flag
 *
 * A boolean probe that answers 200 while set and 503 otherwise.
 * Used for both the readiness and the liveness endpoint; each endpoint
 * gets its own instance.
 *
 * @module @drainguard/healthcheck/ReadinessFlag
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import type { HandlerObject, ReadinessSetter } from "./types.ts";

/**
 * HTTP status codes for each flag value
 */
const STATUS_READY = 200;
const STATUS_NOT_READY = 503;

/**
 * Readiness flag
 *
 * @example
 * ```typescript
 * import { ReadinessFlag } from '@drainguard/healthcheck';
 *
 * const ready = new ReadinessFlag();
 * ready.setReady(false); // GET /ready -> 503
 * ```
 */
export class ReadinessFlag implements HandlerObject, ReadinessSetter {
    private _ready: boolean;

    constructor(ready = true) {
        this._ready = ready;
    }

    /**
     * Set the flag
     *
     * @param ready - New value
     */
    setReady(ready: boolean): void {
        this._ready = ready;
    }

    /**
     * Current flag value
     */
    isReady(): boolean {
        return this._ready;
    }

    /**
     * Write the probe response: 200 when set, 503 otherwise, no body
     */
    handle(_req: IncomingMessage, res: ServerResponse): void {
        res.statusCode = this._ready ? STATUS_READY : STATUS_NOT_READY;
        res.end();
    }
}

/**
 * Create a new, independent readiness flag
 */
export function createReadinessFlag(ready = true): ReadinessFlag {
    return new ReadinessFlag(ready);
}
