// Frame Pipeline - Live Stats Server
// Read-only HTTP + WebSocket view of a running pipeline.
//
//   GET /health   → { status: "ok" }
//   GET /stats    → { state, counters, queueDepth }
//   WebSocket     → "stats" on connect, then "rate_sample" / "state_change" pushes

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import type { LifecycleState, RateSample, StatsMessage, StatsSnapshot, StatsSource } from "./types.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";

export interface CreateStatsServerOptions {
  source: StatsSource;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface StatsServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening. Resolves with the bound port (pass 0 for an OS-assigned one). */
  listen(port: number): Promise<number>;
  broadcastRateSample(sample: RateSample): void;
  broadcastStateChange(state: LifecycleState): void;
  /** Disconnect all clients and stop listening. */
  close(): Promise<void>;
}

export function snapshotOf(source: StatsSource): StatsSnapshot {
  return {
    state: source.getState(),
    counters: source.getCounters(),
    queueDepth: source.getQueueDepth(),
  };
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createStatsServer(options: CreateStatsServerOptions): StatsServer {
  const { source, logger = createConsoleLogger() } = options;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/stats", (_req, res) => {
    res.json(snapshotOf(source));
  });

  const wss = new WebSocketServer({ server: httpServer });

  // ws re-emits HTTP server errors here; listen() reports bind failures itself
  wss.on("error", (err) => {
    logger.error(`[STATS] server error: ${errorMessage(err)}`);
  });

  wss.on("connection", (ws: WebSocket) => {
    logger.info(`[STATS] client connected (${wss.clients.size} total)`);
    sendMessage(ws, { type: "stats", ...snapshotOf(source) });

    ws.on("error", (err) => {
      logger.warn(`[STATS] client error: ${errorMessage(err)}`);
    });
  });

  const broadcast = (message: StatsMessage): void => {
    for (const client of wss.clients) {
      sendMessage(client, message);
    }
  };

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.removeListener("error", reject);
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`[STATS] listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    broadcastRateSample(sample: RateSample): void {
      broadcast({ type: "rate_sample", ...sample });
    },
    broadcastStateChange(state: LifecycleState): void {
      broadcast({ type: "state_change", state });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

export function sendMessage(ws: WebSocket, message: StatsMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
