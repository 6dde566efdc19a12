/**
 * GPGGA UDP Listener
 *
 * Receives extended GPGGA sentences from GPS devices, one per datagram.
 *
 * Datagram Flow:
 * 1. Datagram arrives → counted
 * 2. Strict UTF-8 decode → decode error counted and dropped
 * 3. Sentence parsed → parse error counted and dropped
 * 4. Concurrency cap checked → parsed record dropped if too many handlers in flight
 * 5. Handler dispatched (not awaited) with the record and sender address
 */

import dgram from "node:dgram";
import type { RemoteInfo, Socket } from "node:dgram";
import { config } from "../config.ts";
import { createLogger } from "../utils/logger.ts";
import { BindError, getErrorCode, getErrorMessage, type BindFailureCause } from "../types/errors.ts";
import { noopMetrics, type MetricsSink } from "../relay/metrics.ts";
import { parseGpggaSentence } from "./nmea-parser.ts";
import type { PositionRecord, SenderAddress, UDPListenerStats } from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Called once per valid position record */
export type PositionHandler = (record: PositionRecord, sender: SenderAddress) => void | Promise<unknown>;

export interface UDPListenerOptions {
  host: string;
  /** 0 picks a free port */
  port: number;
  /** Requested receive buffer; the socket asks for at least 64 KiB */
  bufferSize: number;
  /** Max handler invocations in flight before parsed records are dropped */
  maxConcurrentHandlers: number;
  metrics: MetricsSink;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

const MIN_RECEIVE_BUFFER_BYTES = 64 * 1024;

const log = createLogger("UDP Listener");

function bindFailureCause(code: string | null): BindFailureCause {
  switch (code) {
    case "EADDRINUSE":
      return "address_in_use";
    case "EACCES":
    case "EPERM":
      return "permission_denied";
    default:
      return "os_error";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// UDP LISTENER CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class UDPListener {
  private socket: Socket | null = null;
  private handler: PositionHandler;
  private options: UDPListenerOptions;
  private metrics: MetricsSink;
  private decoder = new TextDecoder("utf-8", { fatal: true });
  private isRunning = false;
  private inFlight = 0;
  private stats: Omit<UDPListenerStats, "inFlight" | "errorRate">;

  constructor(handler: PositionHandler, options?: Partial<UDPListenerOptions>) {
    this.handler = handler;
    this.options = {
      host: options?.host ?? config.udp.host,
      port: options?.port ?? config.udp.port,
      bufferSize: options?.bufferSize ?? config.udp.bufferSize,
      maxConcurrentHandlers: options?.maxConcurrentHandlers ?? config.udp.maxConcurrentMessages,
      metrics: options?.metrics ?? noopMetrics,
    };
    this.metrics = this.options.metrics;
    this.stats = {
      startedAt: null,
      messagesReceived: 0,
      parseErrors: 0,
      decodeErrors: 0,
      dropped: 0,
      totalBytesReceived: 0,
    };
  }

  /**
   * Bind the socket and start receiving.
   * Rejects with BindError when the address can't be bound.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      log.warn("Listener is already running");
      return;
    }

    const { host, port } = this.options;
    const socket = dgram.createSocket({
      type: host.includes(":") ? "udp6" : "udp4",
      reuseAddr: true,
    });

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (error: Error) => {
          socket.off("listening", onListening);
          reject(error);
        };
        const onListening = () => {
          socket.off("error", onError);
          resolve();
        };
        socket.once("error", onError);
        socket.once("listening", onListening);
        socket.bind(port, host);
      });
    } catch (error) {
      const code = getErrorCode(error);
      const cause = bindFailureCause(code);
      const hint = cause === "permission_denied" ? " (try a port above 1024)" : "";
      log.error(`Failed to bind ${host}:${port}: ${getErrorMessage(error)}${hint}`, { cause });

      try {
        socket.close();
      } catch (closeError) {
        log.debug("Socket already closed after bind failure", { error: closeError });
      }

      throw new BindError(cause, host, port, code, `Cannot bind UDP ${host}:${port}: ${getErrorMessage(error)}`);
    }

    this.applySocketOptions(socket);

    socket.on("message", (data, remote) => this.handleDatagram(data, remote));
    socket.on("error", (error) => {
      log.error("Socket error", { error });
    });

    this.socket = socket;
    this.isRunning = true;
    this.stats.startedAt = new Date();

    const address = socket.address();
    log.info(`═══════════════════════════════════════════════════════════════`);
    log.info(`  UDP Listener started on ${address.address}:${address.port}`);
    log.info(`  Waiting for GPGGA sentences...`);
    log.info(`═══════════════════════════════════════════════════════════════`);
  }

  /**
   * Close the socket. Handlers already dispatched finish on their own.
   */
  async stop(): Promise<void> {
    const socket = this.socket;
    if (!this.isRunning || !socket) {
      return;
    }

    log.info("Stopping UDP listener...");
    this.isRunning = false;
    this.socket = null;

    await new Promise<void>((resolve) => socket.close(() => resolve()));
    log.info("UDP listener stopped");
  }

  /** Larger receive buffer; not fatal when the OS refuses */
  private applySocketOptions(socket: Socket): void {
    const requested = Math.max(MIN_RECEIVE_BUFFER_BYTES, this.options.bufferSize);
    try {
      socket.setRecvBufferSize(requested);
    } catch (error) {
      log.warn("Failed to set receive buffer size", { requested, error });
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // DATAGRAM HANDLING
  // ═══════════════════════════════════════════════════════════════════════════════

  private handleDatagram(data: Buffer, remote: RemoteInfo): void {
    this.stats.messagesReceived++;
    this.stats.totalBytesReceived += data.length;
    this.metrics.increment("messagesReceived");

    const sender: SenderAddress = {
      address: remote.address,
      port: remote.port,
      family: remote.family,
    };
    const from = `${sender.address}:${sender.port}`;

    let text: string;
    try {
      text = this.decoder.decode(data);
    } catch (error) {
      this.stats.decodeErrors++;
      this.metrics.increment("decodeErrors");
      log.error("Failed to decode datagram as UTF-8", { from, error, dataHex: data.toString("hex") });
      return;
    }

    log.debug(`Received ${data.length} bytes from ${from}`, { message: text.trim() });

    const result = parseGpggaSentence(text);
    if (!result.ok) {
      this.stats.parseErrors++;
      this.metrics.increment("parseErrors");
      log.warn("Failed to parse GPGGA sentence", {
        from,
        kind: result.error.kind,
        reason: result.error.reason,
        sentence: result.error.sentence,
      });
      return;
    }

    this.metrics.increment("messagesParsed");

    if (this.inFlight >= this.options.maxConcurrentHandlers) {
      this.stats.dropped++;
      this.metrics.increment("ingestDropped");
      log.warn("Handler limit reached, dropping position report", {
        from,
        deviceId: result.record.deviceId,
        inFlight: this.inFlight,
      });
      return;
    }

    void this.dispatch(result.record, sender);
  }

  private async dispatch(record: PositionRecord, sender: SenderAddress): Promise<void> {
    this.inFlight++;
    try {
      await this.handler(record, sender);
    } catch (error) {
      log.error("Error in position handler", {
        deviceId: record.deviceId,
        from: `${sender.address}:${sender.port}`,
        error,
      });
    } finally {
      this.inFlight--;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // STATUS
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Bound address (useful when started on port 0)
   */
  getAddress(): { address: string; port: number } | null {
    if (!this.socket) return null;
    const { address, port } = this.socket.address();
    return { address, port };
  }

  isListening(): boolean {
    return this.isRunning;
  }

  getStats(): UDPListenerStats {
    const errors = this.stats.parseErrors + this.stats.decodeErrors;
    return {
      ...this.stats,
      inFlight: this.inFlight,
      errorRate: this.stats.messagesReceived > 0 ? errors / this.stats.messagesReceived : 0,
    };
  }
}
