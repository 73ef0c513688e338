/**
 * Node HTTP server
 *
 * HttpServer implementation over `node:http`: listen, bounded graceful
 * close, and forced close of every open connection.
 *
 * @module NodeHttpServer
 */

import { EventEmitter } from "node:events";
import type { IncomingMessage, Server, ServerOptions, ServerResponse } from "node:http";
import { createServer } from "node:http";
import type { AddressInfo } from "node:net";
import type { RequestHandler } from "@drainguard/healthcheck";
import env from "env-var";
import { DeadlineExceededError } from "./errors.ts";
import { getLogger } from "./logger.ts";
import type { HttpServer } from "./types.ts";

const logger = getLogger("drainguard.transport");

/**
 * Options for NodeHttpServer
 */
export interface NodeHttpServerOptions {
    /**
     * Application request handler
     * @default responds 404
     */
    handler?: RequestHandler;

    /**
     * Port to listen on (0 picks a free port)
     * @default PORT env or 5000
     */
    port?: number | undefined;

    /**
     * Host to bind
     * @default LISTEN env or "0.0.0.0"
     */
    host?: string | undefined;

    /**
     * Options passed to `http.createServer`
     */
    serverOptions?: ServerOptions | undefined;
}

const notFound: RequestHandler = (_req, res) => {
    res.statusCode = 404;
    res.end("Not Found");
};

/**
 * HttpServer over `node:http`
 *
 * Emits `listening` with the bound AddressInfo once the socket is open.
 *
 * @example
 * ```typescript
 * const server = new NodeHttpServer({ handler: app, port: 0, host: '127.0.0.1' });
 * server.on('listening', (address) => console.log(address.port));
 * ```
 */
export class NodeHttpServer extends EventEmitter implements HttpServer {
    handler: RequestHandler;

    private readonly _port: number | undefined;
    private readonly _host: string | undefined;
    private readonly _serverOptions: ServerOptions;
    private _server: Server | null = null;
    private _address: AddressInfo | null = null;
    private _closing: Promise<void> | null = null;
    private _binding = false;

    constructor(options: NodeHttpServerOptions = {}) {
        super();
        this.handler = options.handler ?? notFound;
        this._port = options.port;
        this._host = options.host;
        this._serverOptions = options.serverOptions ?? {};
    }

    /**
     * The underlying node:http server (null until listen() is called)
     */
    get server(): Server | null {
        return this._server;
    }

    /**
     * The address the server is listening on (null when not listening)
     */
    get address(): AddressInfo | null {
        return this._address;
    }

    /**
     * Create the server and listen. Resolves on close, rejects on error.
     */
    listen(): Promise<void> {
        const port = this._port ?? env.get("PORT").default("5000").asPortNumber();
        const host = this._host ?? env.get("LISTEN").default("0.0.0.0").asString();

        const server = createServer(this._serverOptions, (req, res) => this._onRequest(req, res));
        this._server = server;
        this._binding = true;

        return new Promise<void>((resolve, reject) => {
            server.once("error", (err) => {
                this._binding = false;
                this._address = null;
                reject(err);
            });
            server.once("close", () => {
                this._address = null;
                resolve();
            });

            server.listen(port, host, () => {
                this._binding = false;
                const address = server.address();
                if (address && typeof address === "object") {
                    this._address = address;
                    const displayHost = address.address === "::" ? "localhost" : address.address;
                    logger.info(`Server listening ${displayHost}:${address.port}`);
                    this.emit("listening", address);
                }
            });
        });
    }

    /**
     * Stop accepting connections and wait for open ones to finish.
     *
     * Rejects with DeadlineExceededError if `signal` aborts first; the
     * server keeps closing in the background.
     */
    async shutdown(signal: AbortSignal): Promise<void> {
        const closing = this._startClose();
        if (!closing) return;

        await new Promise<void>((resolve, reject) => {
            const onAbort = () => reject(new DeadlineExceededError());

            void closing.then(
                () => {
                    signal.removeEventListener("abort", onAbort);
                    resolve();
                },
                (err: unknown) => {
                    signal.removeEventListener("abort", onAbort);
                    reject(err);
                },
            );

            if (signal.aborted) {
                onAbort();
                return;
            }
            signal.addEventListener("abort", onAbort, { once: true });
        });
    }

    /**
     * Destroy every open connection and wait for the server to close
     */
    async forceClose(): Promise<void> {
        const closing = this._startClose();
        if (!closing) return;

        this._server?.closeAllConnections();
        await closing;
    }

    private _onRequest(req: IncomingMessage, res: ServerResponse): void {
        if (this._closing) {
            res.setHeader("Connection", "close");
        }
        // Requests in flight when closing began would otherwise keep their
        // keep-alive socket open until keepAliveTimeout
        res.once("finish", () => {
            if (this._closing) {
                req.socket.end();
            }
        });

        this.handler(req, res);
    }

    /**
     * Begin closing once; later calls share the same promise.
     *
     * A server still binding (hostname lookup in progress) is closed as soon
     * as it is listening; one that fails to bind has nothing left to close.
     *
     * @returns null when there is no listening server to close
     */
    private _startClose(): Promise<void> | null {
        if (this._closing) return this._closing;

        const server = this._server;
        if (!server || (!server.listening && !this._binding)) return null;

        this._closing = new Promise<void>((resolve, reject) => {
            const close = () => {
                server.close((err) => {
                    if (err) reject(err);
                    else resolve();
                });
                server.closeIdleConnections();
            };

            if (server.listening) {
                close();
                return;
            }

            logger.debug("Close requested while binding, closing once listening");
            const onListening = () => {
                server.off("error", onError);
                close();
            };
            const onError = () => {
                server.off("listening", onListening);
                resolve();
            };
            server.once("listening", onListening);
            server.once("error", onError);
        });

        return this._closing;
    }
}
