/**
 * Path multiplexer
 *
 * Dispatches requests by URL path. A pattern ending in "/" matches its
 * whole subtree, any other pattern matches exactly one path. The longest
 * matching pattern wins. Registering a pattern twice replaces the earlier
 * handler.
 *
 * @module @drainguard/healthcheck/ServeMux
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import type { HandlerObject, HealthHandler, RequestHandler } from "./types.ts";
import { toRequestHandler } from "./types.ts";

export class ServeMux implements HandlerObject {
    private readonly _routes = new Map<string, RequestHandler>();

    /**
     * Register a handler for a path pattern
     *
     * @throws {Error} If the pattern does not start with "/"
     */
    register(pattern: string, handler: HealthHandler): void {
        if (!pattern.startsWith("/")) {
            throw new Error(`Invalid path pattern "${pattern}": must start with "/"`);
        }
        this._routes.set(pattern, toRequestHandler(handler));
    }

    /**
     * Find the handler registered for a path
     *
     * @returns The handler, or undefined when no pattern matches
     */
    match(path: string): RequestHandler | undefined {
        const exact = this._routes.get(path);
        if (exact) return exact;

        let best: string | undefined;
        for (const pattern of this._routes.keys()) {
            if (!pattern.endsWith("/") || !path.startsWith(pattern)) continue;
            if (best === undefined || pattern.length > best.length) {
                best = pattern;
            }
        }

        return best === undefined ? undefined : this._routes.get(best);
    }

    handle(req: IncomingMessage, res: ServerResponse): void {
        const pathname = (req.url ?? "/").split("?")[0] ?? "/";
        const handler = this.match(pathname);

        if (!handler) {
            res.statusCode = 404;
            res.end("Not Found");
            return;
        }

        handler(req, res);
    }
}
