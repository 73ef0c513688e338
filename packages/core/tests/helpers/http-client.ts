/**
 * Minimal HTTP client for integration tests.
 *
 * Uses a fresh connection per request (no agent), so the server under test
 * never holds idle keep-alive sockets from the client.
 */

import { request } from "node:http";

/**
 * Send a GET request and resolve with the response status
 */
export function getStatus(port: number, path: string): Promise<number> {
    return new Promise<number>((resolve, reject) => {
        const req = request({ host: "127.0.0.1", port, path, method: "GET", agent: false }, (res) => {
            res.resume();
            res.on("end", () => resolve(res.statusCode ?? 0));
        });
        req.on("error", reject);
        req.end();
    });
}
