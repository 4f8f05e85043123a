/**
 * HTTP status endpoints.
 *
 *   GET /health  supervisor and credential status
 *   GET /turn    current RTC config, so joining viewers get the
 *                latest STUN/TURN servers
 */

import { createServer, Server } from "http";

export interface StatusServerOptions {
  port: number;
  host?: string;
  getStats: () => Record<string, unknown>;
  getRtcConfig: () => string;
  /** Listen failures, e.g. the port is taken. */
  onError: (err: Error) => void;
}

export function createStatusServer(options: StatusServerOptions): Server {
  const server = createServer((req, res) => {
    const path = (req.url ?? "/").split("?")[0];

    if (req.method === "GET" && path === "/health") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "ok", ...options.getStats() }));
      return;
    }

    if (req.method === "GET" && path === "/turn") {
      res.writeHead(200, {
        "Content-Type": "application/json",
        "Cache-Control": "no-store",
      });
      res.end(options.getRtcConfig());
      return;
    }

    res.writeHead(404);
    res.end("Not found");
  });

  server.on("error", options.onError);

  server.listen(options.port, options.host, () => {
    const address = server.address();
    const port = typeof address === "object" && address ? address.port : options.port;
    console.log(`[Health] http://localhost:${port}/health`);
  });

  return server;
}
