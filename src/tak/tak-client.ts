/**
 * TAK Server Client
 *
 * Maintains the single outbound connection to a TAK server (TCP or TLS) and
 * writes queued CoT events to it, newline-terminated, in FIFO order.
 *
 * Features:
 * - Supervising loop with fixed-interval reconnect
 * - Periodic liveness check while connected
 * - Bounded outbound queue; producers wait up to the send timeout
 * - Queued events survive reconnects but are discarded on stop
 *
 * State Machine:
 *   disconnected → connecting → connected
 *        ↑              │            │
 *        └── (wait) ────┘            │
 *        └─────── (liveness fail) ───┘
 */

import net from "node:net";
import tls from "node:tls";
import { setTimeout as sleep } from "node:timers/promises";
import { config } from "../config.ts";
import { createLogger } from "../utils/logger.ts";
import { getErrorMessage } from "../types/errors.ts";
import { BoundedQueue } from "./outbound-queue.ts";
import { buildTlsOptions, type TakTlsOptions } from "./tls.ts";
import type { SendOutcome, TakClientStats, TakConnectionState, TakProtocol } from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface TakClientOptions {
  host: string;
  port: number;
  protocol: TakProtocol;
  /** Fixed wait after a failed connect (ms) */
  reconnectIntervalMs: number;
  /** Max wait for queue space per send (ms) */
  sendTimeoutMs: number;
  queueSize: number;
  /** Liveness check interval while connected (ms) */
  healthCheckIntervalMs: number;
  /** Give up on a single connect attempt after this long (ms) */
  connectTimeoutMs: number;
  certFile: string | null;
  keyFile: string | null;
  caFile: string | null;
}

/** Event types emitted by the TAK client */
export type TakClientEvent =
  | "connected"
  | "disconnected"
  | "state_change";

export type TakClientCallback = (state: TakConnectionState) => void;

interface MutableStats {
  messagesSent: number;
  sendErrors: number;
  dropped: number;
  reconnectAttempts: number;
  lastConnected: Date | null;
  lastError: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

const log = createLogger("TAK Client");

/**
 * Sleep that ends early on abort. Returns false when aborted.
 */
async function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) return false;
    throw error;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TAK CLIENT CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class TakClient {
  private options: TakClientOptions;
  private queue: BoundedQueue<string>;
  private tlsOptions: TakTlsOptions | null = null;

  private socket: net.Socket | null = null;
  private state: TakConnectionState = "disconnected";
  private running = false;
  private abortController: AbortController | null = null;
  private supervisor: Promise<void> | null = null;

  private stats: MutableStats = {
    messagesSent: 0,
    sendErrors: 0,
    dropped: 0,
    reconnectAttempts: 0,
    lastConnected: null,
    lastError: null,
  };

  private eventListeners: Map<TakClientEvent, Set<TakClientCallback>> = new Map();

  constructor(options?: Partial<TakClientOptions>) {
    this.options = {
      host: options?.host ?? config.tak.host,
      port: options?.port ?? config.tak.port,
      protocol: options?.protocol ?? config.tak.protocol,
      reconnectIntervalMs: options?.reconnectIntervalMs ?? config.tak.reconnectIntervalMs,
      sendTimeoutMs: options?.sendTimeoutMs ?? config.tak.sendTimeoutMs,
      queueSize: options?.queueSize ?? config.tak.queueSize,
      healthCheckIntervalMs: options?.healthCheckIntervalMs ?? config.tak.healthCheckIntervalMs,
      connectTimeoutMs: options?.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      certFile: options?.certFile !== undefined ? options.certFile : config.tak.certFile,
      keyFile: options?.keyFile !== undefined ? options.keyFile : config.tak.keyFile,
      caFile: options?.caFile !== undefined ? options.caFile : config.tak.caFile,
    };
    this.queue = new BoundedQueue<string>(this.options.queueSize);

    const events: TakClientEvent[] = ["connected", "disconnected", "state_change"];
    for (const event of events) {
      this.eventListeners.set(event, new Set());
    }
  }

  private get serverLabel(): string {
    return `${this.options.protocol}://${this.options.host}:${this.options.port}`;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Start the supervising loop. Resolves once the loop is running (not once
   * connected). Throws TlsCredentialError if TLS credentials can't be loaded.
   */
  async start(): Promise<void> {
    if (this.running) {
      log.warn("TAK client is already running");
      return;
    }

    if (this.options.protocol === "tls") {
      this.tlsOptions = buildTlsOptions(this.options.host, this.options);
    }

    this.running = true;
    this.abortController = new AbortController();
    this.supervisor = this.supervise(this.abortController.signal).catch((error) => {
      this.stats.lastError = getErrorMessage(error);
      log.error("TAK supervising loop failed", { error });
    });

    log.info(`TAK client started (${this.serverLabel})`);
  }

  /**
   * Stop the loop, close the socket and discard anything still queued.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    log.info("Stopping TAK client...");
    this.running = false;
    this.abortController?.abort();
    this.socket?.destroy();

    await this.supervisor;
    this.supervisor = null;
    this.abortController = null;

    const discarded = this.queue.drain();
    if (discarded > 0) {
      log.warn(`Discarded ${discarded} queued message(s) on stop`);
    }

    this.updateState("disconnected");
    log.info("TAK client stopped");
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SENDING
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Queue one CoT event for transmission. Never throws.
   */
  async send(payload: string): Promise<SendOutcome> {
    if (!this.running) {
      this.stats.sendErrors++;
      log.warn("Cannot send CoT - client not running");
      return "error";
    }

    const line = payload.endsWith("\n") ? payload : `${payload}\n`;

    try {
      const result = await this.queue.offer(line, this.options.sendTimeoutMs);
      switch (result) {
        case "accepted":
          log.debug("CoT message queued", { queueSize: this.queue.size });
          return "queued";
        case "timeout":
          this.stats.sendErrors++;
          this.stats.dropped++;
          log.error("Timeout queuing CoT message - queue full", { queueSize: this.queue.size });
          return "timeout";
        case "closed":
          this.stats.sendErrors++;
          log.warn("CoT message discarded - client stopping");
          return "error";
      }
    } catch (error) {
      this.stats.sendErrors++;
      this.stats.lastError = getErrorMessage(error);
      log.error("Failed to queue CoT message", { error });
      return "error";
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SUPERVISING LOOP
  // ─────────────────────────────────────────────────────────────────────────────

  private async supervise(signal: AbortSignal): Promise<void> {
    let attempts = 0;

    while (!signal.aborted) {
      if (attempts > 0) {
        this.stats.reconnectAttempts++;
      }
      attempts++;

      this.updateState("connecting");
      log.info(`Connecting to TAK server ${this.serverLabel}...`);

      let socket: net.Socket;
      try {
        socket = await this.connect(signal);
      } catch (error) {
        if (signal.aborted) break;

        this.stats.lastError = getErrorMessage(error);
        this.updateState("disconnected");
        log.error(`TAK connection failed: ${this.stats.lastError}`, {
          retryInMs: this.options.reconnectIntervalMs,
        });

        if (!(await pause(this.options.reconnectIntervalMs, signal))) break;
        continue;
      }

      await this.runConnection(socket, signal);
    }
  }

  /**
   * Run one connected session until liveness fails or the client stops
   */
  private async runConnection(socket: net.Socket, signal: AbortSignal): Promise<void> {
    this.socket = socket;
    this.stats.lastConnected = new Date();
    this.updateState("connected");
    log.info(`✓ Connected to TAK server ${this.serverLabel}`);

    if (this.tlsOptions && !this.tlsOptions.verifyServer) {
      log.warn("TLS certificate verification disabled - no CA certificate provided");
    }

    socket.on("error", (error) => {
      this.stats.lastError = error.message;
      log.warn(`TAK socket error: ${error.message}`);
    });
    socket.on("data", (data: Buffer) => {
      log.debug(`Ignoring ${data.length} bytes from TAK server`);
    });

    const writerAbort = new AbortController();
    const stopWriter = () => writerAbort.abort();
    signal.addEventListener("abort", stopWriter, { once: true });

    let writerFinished = false;
    const writer = this.runWriter(socket, writerAbort.signal).finally(() => {
      writerFinished = true;
    });

    while (!signal.aborted) {
      if (!(await pause(this.options.healthCheckIntervalMs, signal))) break;

      if (socket.destroyed || !socket.writable || writerFinished) {
        log.warn("TAK connection lost - reconnecting");
        break;
      }
    }

    signal.removeEventListener("abort", stopWriter);
    writerAbort.abort();
    socket.destroy();
    await writer;

    this.socket = null;
    this.updateState("disconnected");
  }

  /**
   * Drain the queue to the socket until aborted or a write fails
   */
  private async runWriter(socket: net.Socket, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let line: string;
      try {
        line = await this.queue.take(signal);
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }

      try {
        await this.write(socket, line);
        this.stats.messagesSent++;
      } catch (error) {
        this.stats.sendErrors++;
        this.stats.lastError = getErrorMessage(error);
        log.error(`Failed to write CoT message: ${this.stats.lastError}`);
        return;
      }
    }
  }

  private write(socket: net.Socket, line: string): Promise<void> {
    return new Promise((resolve, reject) => {
      socket.write(line, "utf8", (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Open a TCP or TLS socket, resolving once it is ready for writes
   */
  private connect(signal: AbortSignal): Promise<net.Socket> {
    const { host, port, connectTimeoutMs } = this.options;

    return new Promise((resolve, reject) => {
      const socket = this.tlsOptions
        ? tls.connect({ ...this.tlsOptions.connectOptions, host, port })
        : net.connect({ host, port });
      const readyEvent = this.tlsOptions ? "secureConnect" : "connect";

      const cleanup = () => {
        socket.off(readyEvent, onReady);
        socket.off("error", onError);
        socket.off("timeout", onTimeout);
        signal.removeEventListener("abort", onAbort);
        socket.setTimeout(0);
      };
      const fail = (error: Error) => {
        cleanup();
        socket.destroy();
        reject(error);
      };
      const onReady = () => {
        cleanup();
        socket.setNoDelay(true);
        resolve(socket);
      };
      const onError = (error: Error) => fail(error);
      const onTimeout = () => fail(new Error(`connect timed out after ${connectTimeoutMs}ms`));
      const onAbort = () => fail(new Error("connect aborted"));

      socket.once(readyEvent, onReady);
      socket.once("error", onError);
      socket.once("timeout", onTimeout);
      socket.setTimeout(connectTimeoutMs);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // STATUS
  // ─────────────────────────────────────────────────────────────────────────────

  isConnected(): boolean {
    return this.state === "connected";
  }

  getState(): TakConnectionState {
    return this.state;
  }

  getStats(): TakClientStats {
    const { messagesSent, sendErrors } = this.stats;
    const attempts = messagesSent + sendErrors;
    return {
      connected: this.state === "connected",
      state: this.state,
      messagesSent,
      sendErrors,
      errorRate: attempts > 0 ? sendErrors / attempts : 0,
      dropped: this.stats.dropped,
      queueSize: this.queue.size,
      queueCapacity: this.queue.capacity,
      maxQueueSize: this.queue.maxSize,
      reconnectAttempts: this.stats.reconnectAttempts,
      lastConnected: this.stats.lastConnected,
      lastError: this.stats.lastError,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // EVENT HANDLING
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Subscribe to client events. Returns an unsubscribe function.
   */
  on(event: TakClientEvent, callback: TakClientCallback): () => void {
    this.eventListeners.get(event)?.add(callback);
    return () => {
      this.eventListeners.get(event)?.delete(callback);
    };
  }

  private emit(event: TakClientEvent, state: TakConnectionState): void {
    const callbacks = this.eventListeners.get(event);
    if (!callbacks) return;
    for (const callback of callbacks) {
      try {
        callback(state);
      } catch (error) {
        log.error(`Error in ${event} listener`, { error });
      }
    }
  }

  private updateState(state: TakConnectionState): void {
    const previous = this.state;
    if (previous === state) return;
    this.state = state;

    log.debug(`State: ${previous} → ${state}`);
    this.emit("state_change", state);
    if (state === "connected") {
      this.emit("connected", state);
    } else if (previous === "connected") {
      this.emit("disconnected", state);
    }
  }
}
