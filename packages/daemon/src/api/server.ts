import http from "http";
import { createHTTPHandler } from "@trpc/server/adapters/standalone";
import { applyWSSHandler } from "@trpc/server/adapters/ws";
import { WebSocketServer } from "ws";
import { appRouter } from "./router.js";
import type { TRPCContext } from "./context.js";

export interface ApiServer {
  close(): Promise<void>;
}

export function startApiServer(ctx: TRPCContext, port: number, host = "0.0.0.0"): ApiServer {
  const log = ctx.log.child("API");
  const handler = createHTTPHandler({
    router: appRouter,
    createContext: () => ctx,
    onError: ({ path, error }) => {
      if (error.code === "INTERNAL_SERVER_ERROR") {
        log.error(`${path ?? "<unknown>"} failed:`, error);
      }
    },
  });

  const server = http.createServer((req, res) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.writeHead(200);
      res.end();
      return;
    }

    // strip /trpc prefix so procedure names resolve correctly
    const url = req.url ?? "/";
    if (url.startsWith("/trpc")) {
      req.url = url.replace(/^\/trpc/, "") || "/";
    }
    handler(req, res);
  });

  const wss = new WebSocketServer({ server });
  const wssHandler = applyWSSHandler({
    wss,
    router: appRouter,
    createContext: () => ctx,
  });

  server.listen(port, host);
  log.info(`HTTP + WebSocket server listening on ${host}:${port}`);

  return {
    close: () =>
      new Promise<void>((resolve) => {
        wssHandler.broadcastReconnectNotification();
        wss.close();
        server.close(() => resolve());
        server.closeAllConnections();
      }),
  };
}
