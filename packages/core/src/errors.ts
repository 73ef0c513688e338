/**
 * Shutdown errors
 *
 * @module errors
 */

/**
 * Raised by an HTTP server's graceful shutdown when its deadline fires
 * before in-flight requests finish. The coordinator recovers from it by
 * force-closing the server.
 */
export class DeadlineExceededError extends Error {
    readonly code = "DEADLINE_EXCEEDED";

    constructor(message = "Graceful shutdown deadline exceeded", options?: ErrorOptions) {
        super(message, options);
        this.name = "DeadlineExceededError";
    }
}

/**
 * Type guard for deadline-exceeded errors.
 *
 * Accepts DeadlineExceededError instances and any error-like object with
 * `code === "DEADLINE_EXCEEDED"`, so custom HttpServer implementations do not
 * have to import this class.
 */
export function isDeadlineExceededError(err: unknown): err is Error & { code: "DEADLINE_EXCEEDED" } {
    if (err instanceof DeadlineExceededError) return true;
    if (err == null || typeof err !== "object") return false;
    return "code" in err && err.code === "DEADLINE_EXCEEDED";
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
