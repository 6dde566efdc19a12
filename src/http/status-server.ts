/**
 * Status HTTP Server
 *
 * Read-only endpoints for monitoring the relay:
 * - GET /api/status → relay, listener, TAK link and metric snapshot (JSON)
 * - GET /health     → 200 when the TAK link is connected, 503 otherwise
 * - GET /metrics    → the same metrics in Prometheus text format
 */

import http from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { config } from "../config.ts";
import { createLogger } from "../utils/logger.ts";
import { toPrometheusText } from "../relay/metrics.ts";
import type { Relay } from "../relay/relay.ts";

export interface StatusServerOptions {
  host: string;
  /** 0 picks a free port */
  port: number;
}

const log = createLogger("Status API");

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

function sendText(res: ServerResponse, status: number, contentType: string, body: string): void {
  res.writeHead(status, {
    "Content-Type": contentType,
    "Content-Length": Buffer.byteLength(body),
  });
  res.end(body);
}

export class StatusServer {
  private server: Server | null = null;
  private relay: Relay;
  private options: StatusServerOptions;

  constructor(relay: Relay, options?: Partial<StatusServerOptions>) {
    this.relay = relay;
    this.options = {
      host: options?.host ?? config.metrics.host,
      port: options?.port ?? config.metrics.port,
    };
  }

  async start(): Promise<void> {
    if (this.server) {
      log.warn("Status server is already running");
      return;
    }

    const server = http.createServer((req, res) => this.handleRequest(req, res));

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      server.once("error", onError);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", onError);
        resolve();
      });
    });

    server.on("error", (error) => {
      log.error("Status server error", { error });
    });

    this.server = server;
    const address = this.getAddress();
    log.info(`✓ Status API listening on http://${this.options.host}:${address?.port ?? this.options.port}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    log.info("Status server stopped");
  }

  getAddress(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address : null;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // ROUTES
  // ─────────────────────────────────────────────────────────────────────────────

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    if (req.method === "GET" && path === "/api/status") {
      const status = this.relay.getStatus();
      sendJson(res, 200, {
        success: true,
        data: {
          uptime: status.uptimeSeconds,
          version: status.version,
          running: status.running,
          listener: status.listener,
          tak: status.tak,
          metrics: status.metrics,
          activeDevices: status.activeDevices,
          knownDevices: status.knownDevices,
        },
      });
      return;
    }

    if (req.method === "GET" && path === "/health") {
      const connected = this.relay.takClient.isConnected();
      sendJson(res, connected ? 200 : 503, {
        status: connected ? "ok" : "degraded",
        timestamp: new Date().toISOString(),
        takConnected: connected,
      });
      return;
    }

    if (req.method === "GET" && path === "/metrics") {
      const status = this.relay.getStatus();
      const body = toPrometheusText(status.metrics, { version: status.version });
      sendText(res, 200, "text/plain; version=0.0.4; charset=utf-8", body);
      return;
    }

    sendJson(res, 404, { success: false, error: "Not found" });
  }
}
