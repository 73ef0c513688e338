/**
 * Shutdown Coordinator
 *
 * Drives a server from serving to closed: announce not-ready, wait out the
 * grace period, close gracefully within a bound, force-close past it.
 *
 * @module ShutdownCoordinator
 */

import type { HealthHandler } from "@drainguard/healthcheck";
import { isReadinessSetter } from "@drainguard/healthcheck";
import { isDeadlineExceededError } from "./errors.ts";
import { getLogger } from "./logger.ts";
import type { HttpServer, ListenOutcome } from "./types.ts";
import { ShutdownState } from "./types.ts";

const logger = getLogger("drainguard.shutdown");

/**
 * Longest delay a Node.js timer honours; larger delays fire after 1ms
 */
export const MAX_DURATION_MS = 2_147_483_647;

/**
 * @throws {Error} If `value` is not a finite number of milliseconds in [0, MAX_DURATION_MS]
 */
export function assertDuration(name: string, value: number): void {
    if (!Number.isFinite(value) || value < 0 || value > MAX_DURATION_MS) {
        throw new Error(`Invalid ${name}: expected between 0 and ${MAX_DURATION_MS} milliseconds, got ${value}`);
    }
}

/**
 * Timing and observation options for the coordinator
 */
export interface ShutdownCoordinatorOptions {
    /** Grace period in milliseconds */
    waitBeforeShutdown: number;
    /** Bound on the graceful close in milliseconds, counted from the end of the grace period */
    shutdownTimeout: number;
    /** Called on every state transition */
    onStateChange?: (state: ShutdownState) => void;
}

/**
 * Shutdown state machine for one server
 *
 * Sequence on `shutdown(signal)`:
 *
 * 1. Listener already ended: return its outcome, touch nothing else
 * 2. Readiness handler implements `setReady`: report not ready
 * 3. Race the listener ending, the grace timer, and the caller's signal
 * 4. Listener won: return its outcome. Otherwise close gracefully with a
 *    fresh `shutdownTimeout` bound
 * 5. Bound exceeded: force-close and return that result
 */
export class ShutdownCoordinator {
    private _state: ShutdownState = ShutdownState.SERVING;
    private _outcome: ListenOutcome | undefined;
    private _shutdownPromise: Promise<void> | null = null;

    private readonly _server: HttpServer;
    private readonly _readyHandler: HealthHandler;
    private readonly _terminated: Promise<ListenOutcome>;
    private readonly _options: ShutdownCoordinatorOptions;

    /**
     * @param server - Server to close
     * @param readyHandler - Readiness handler, capability-checked at shutdown
     * @param terminated - One-shot listen outcome; must never reject
     * @param options - Timing options
     */
    constructor(server: HttpServer, readyHandler: HealthHandler, terminated: Promise<ListenOutcome>, options: ShutdownCoordinatorOptions) {
        assertDuration("waitBeforeShutdown", options.waitBeforeShutdown);
        assertDuration("shutdownTimeout", options.shutdownTimeout);

        this._server = server;
        this._readyHandler = readyHandler;
        this._terminated = terminated;
        this._options = options;

        void terminated.then((outcome) => {
            this._outcome = outcome;
            if (this._state === ShutdownState.SERVING) {
                this._transition(outcome.ok ? ShutdownState.CLOSED : ShutdownState.FAILED_TO_START);
            }
        });
    }

    get state(): ShutdownState {
        return this._state;
    }

    /**
     * Run the shutdown sequence. Repeated calls share the first call's promise.
     *
     * @param signal - Caller deadline; shortens the grace period only
     */
    shutdown(signal?: AbortSignal): Promise<void> {
        if (!this._shutdownPromise) {
            this._shutdownPromise = this._run(signal);
        }
        return this._shutdownPromise;
    }

    private async _run(signal?: AbortSignal): Promise<void> {
        if (this._outcome) {
            this._settle(this._outcome);
            return;
        }

        if (isReadinessSetter(this._readyHandler)) {
            this._readyHandler.setReady(false);
            logger.info("Readiness set to not ready");
        } else {
            logger.debug("Readiness handler has no setReady, skipping readiness flip");
        }
        this._transition(ShutdownState.DRAINING_ANNOUNCED);

        this._transition(ShutdownState.DRAINING_GRACE);
        const early = await this._waitForGrace(signal);
        if (early) {
            this._settle(early);
            return;
        }

        this._transition(ShutdownState.CLOSING);
        try {
            await this._close();
        } finally {
            this._transition(ShutdownState.CLOSED);
        }
    }

    /**
     * Wait for the first of: listener outcome, grace timer, caller signal.
     *
     * @returns The listener outcome if it came first, otherwise undefined
     */
    private _waitForGrace(signal?: AbortSignal): Promise<ListenOutcome | undefined> {
        const { waitBeforeShutdown } = this._options;

        return new Promise<ListenOutcome | undefined>((resolve) => {
            let timer: ReturnType<typeof globalThis.setTimeout> | undefined;

            const onAbort = () => {
                logger.info("Shutdown signal aborted, ending grace period early");
                finish(undefined);
            };

            const finish = (outcome: ListenOutcome | undefined) => {
                if (timer !== undefined) {
                    globalThis.clearTimeout(timer);
                }
                signal?.removeEventListener("abort", onAbort);
                resolve(outcome);
            };

            if (signal?.aborted) {
                onAbort();
                return;
            }

            logger.info(`Waiting ${waitBeforeShutdown}ms before closing`);
            timer = globalThis.setTimeout(() => finish(undefined), waitBeforeShutdown);
            signal?.addEventListener("abort", onAbort, { once: true });
            void this._terminated.then(finish);
        });
    }

    /**
     * Graceful close bounded by shutdownTimeout, force close past the bound
     */
    private async _close(): Promise<void> {
        const { shutdownTimeout } = this._options;

        // Fresh bound: the caller's signal only shortens the grace period
        const bound = new AbortController();
        const timer = globalThis.setTimeout(() => bound.abort(), shutdownTimeout);

        try {
            await this._server.shutdown(bound.signal);
            logger.info("Server closed gracefully");
        } catch (err) {
            if (!isDeadlineExceededError(err)) {
                throw err;
            }
            logger.warn(`Shutdown timeout (${shutdownTimeout}ms) exceeded, forcing close`);
            await this._server.forceClose();
        } finally {
            globalThis.clearTimeout(timer);
        }
    }

    private _settle(outcome: ListenOutcome): void {
        if (outcome.ok) {
            this._transition(ShutdownState.CLOSED);
            return;
        }
        this._transition(ShutdownState.FAILED_TO_START);
        throw outcome.error;
    }

    private _transition(state: ShutdownState): void {
        if (this._state === state) return;
        this._state = state;
        this._options.onStateChange?.(state);
    }
}
