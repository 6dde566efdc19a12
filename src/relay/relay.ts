/**
 * GPGGA → CoT Relay
 *
 * Wires the pipeline together:
 *   UDP listener → NMEA parser → CoT encoder → TAK client
 *
 * Every stage failure is counted and the message dropped; nothing a single
 * datagram does can stop the relay. Also runs the periodic statistics
 * monitor and the active-device housekeeping.
 */

import { config } from "../config.ts";
import { createLogger } from "../utils/logger.ts";
import { CotEncoder } from "../cot/cot-encoder.ts";
import { UDPListener, type UDPListenerOptions } from "../devices/udp-listener.ts";
import { TakClient, type TakClientOptions } from "../tak/tak-client.ts";
import { RelayMetrics, type MetricsSnapshot } from "./metrics.ts";
import type {
  PositionRecord,
  SenderAddress,
  SendOutcome,
  TakClientStats,
  UDPListenerStats,
} from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const RELAY_VERSION = "1.0.0";

export interface RelayOptions {
  listener: Partial<Omit<UDPListenerOptions, "metrics">>;
  tak: Partial<TakClientOptions>;
  deviceType: string;
  staleTimeSeconds: number;
  /** Statistics log / gauge refresh interval (ms) */
  monitorIntervalMs: number;
  /** Active-device set is cleared this often (ms) */
  deviceCleanupIntervalMs: number;
}

export interface RelayStatus {
  running: boolean;
  startedAt: Date | null;
  uptimeSeconds: number;
  version: string;
  listener: UDPListenerStats;
  tak: TakClientStats;
  /** Devices seen since the last cleanup */
  activeDevices: number;
  /** Devices with an identity this process lifetime */
  knownDevices: number;
  metrics: MetricsSnapshot;
}

const log = createLogger("Relay");

// ═══════════════════════════════════════════════════════════════════════════════
// RELAY CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class Relay {
  readonly metrics = new RelayMetrics();
  readonly encoder: CotEncoder;
  readonly listener: UDPListener;
  readonly takClient: TakClient;

  private options: RelayOptions;
  private activeDevices: Set<string> = new Set();
  private running = false;
  private startedAt: Date | null = null;
  private monitorTimer: ReturnType<typeof setInterval> | null = null;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private unsubscribeTak: (() => void) | null = null;

  constructor(options?: Partial<RelayOptions>) {
    this.options = {
      listener: options?.listener ?? {},
      tak: options?.tak ?? {},
      deviceType: options?.deviceType ?? config.cot.deviceType,
      staleTimeSeconds: options?.staleTimeSeconds ?? config.cot.staleTimeSeconds,
      monitorIntervalMs: options?.monitorIntervalMs ?? config.monitor.intervalMs,
      deviceCleanupIntervalMs: options?.deviceCleanupIntervalMs ?? config.monitor.deviceCleanupIntervalMs,
    };

    this.encoder = new CotEncoder({
      deviceType: this.options.deviceType,
      staleTimeSeconds: this.options.staleTimeSeconds,
      metrics: this.metrics,
    });
    this.takClient = new TakClient(this.options.tak);
    this.listener = new UDPListener(
      (record, sender) => this.handlePosition(record, sender),
      { ...this.options.listener, metrics: this.metrics }
    );
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Start the TAK link, then the UDP listener.
   * Throws TlsCredentialError or BindError; nothing is left running on failure.
   */
  async start(): Promise<void> {
    if (this.running) {
      log.warn("Relay is already running");
      return;
    }

    log.info("Starting GPGGA to CoT relay...");

    const unsubscribe = this.takClient.on("state_change", (state) => {
      this.metrics.setGauge("takConnected", state === "connected" ? 1 : 0);
    });

    try {
      await this.takClient.start();
      await this.listener.start();
    } catch (error) {
      await this.takClient.stop();
      unsubscribe();
      throw error;
    }

    this.unsubscribeTak = unsubscribe;

    this.running = true;
    this.startedAt = new Date();
    this.startMonitor();

    log.info("✓ Relay started");
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    log.info("Stopping relay...");
    this.running = false;
    this.stopMonitor();

    await this.listener.stop();
    await this.takClient.stop();

    this.unsubscribeTak?.();
    this.unsubscribeTak = null;
    this.metrics.setGauge("takConnected", 0);

    this.logStatistics();
    log.info("Relay stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // PIPELINE
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Convert one position record and hand it to the TAK link
   */
  async handlePosition(record: PositionRecord, sender: SenderAddress): Promise<SendOutcome | null> {
    const started = performance.now();

    try {
      this.activeDevices.add(record.deviceId);
      this.metrics.setGauge("activeDevices", this.activeDevices.size);

      const conversion = this.encoder.convert(record);
      if (!conversion.ok) {
        return null;
      }

      const outcome = await this.takClient.send(conversion.xml);
      if (outcome === "queued") {
        this.metrics.increment("cotQueued");
        log.debug(`Queued CoT for ${record.deviceId}`, {
          from: `${sender.address}:${sender.port}`,
          uid: conversion.event.uid,
        });
      } else {
        this.metrics.increment("cotSendErrors");
        log.warn(`Failed to queue CoT for ${record.deviceId}: ${outcome}`);
      }
      return outcome;
    } finally {
      this.metrics.observeProcessingTime((performance.now() - started) / 1000);
    }
  }

  /**
   * Forget which devices were active. Identities are kept.
   * Returns how many devices were cleared.
   */
  clearActiveDevices(): number {
    const cleared = this.activeDevices.size;
    this.activeDevices.clear();
    this.metrics.setGauge("activeDevices", 0);
    log.info(`Cleared ${cleared} active device(s)`);
    return cleared;
  }

  getActiveDevices(): string[] {
    return Array.from(this.activeDevices);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // MONITORING
  // ─────────────────────────────────────────────────────────────────────────────

  private startMonitor(): void {
    this.monitorTimer = setInterval(() => {
      this.metrics.setGauge("takConnected", this.takClient.isConnected() ? 1 : 0);
      this.metrics.setGauge("activeDevices", this.activeDevices.size);
      this.logStatistics();
    }, this.options.monitorIntervalMs);

    this.cleanupTimer = setInterval(() => {
      this.clearActiveDevices();
    }, this.options.deviceCleanupIntervalMs);
  }

  private stopMonitor(): void {
    if (this.monitorTimer) {
      clearInterval(this.monitorTimer);
      this.monitorTimer = null;
    }
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  private logStatistics(): void {
    const listener = this.listener.getStats();
    const tak = this.takClient.getStats();

    log.info("Relay statistics", {
      udpReceived: listener.messagesReceived,
      udpParseErrors: listener.parseErrors,
      udpDropped: listener.dropped,
      takConnected: tak.connected,
      takSent: tak.messagesSent,
      takErrors: tak.sendErrors,
      takQueue: `${tak.queueSize}/${tak.queueCapacity}`,
      activeDevices: this.activeDevices.size,
    });

    if (!tak.connected) {
      log.warn("TAK server not connected", { lastError: tak.lastError });
    }
    if (listener.errorRate > 0.1) {
      log.warn(`High UDP parse error rate: ${(listener.errorRate * 100).toFixed(1)}%`);
    }
  }

  getStatus(): RelayStatus {
    return {
      running: this.running,
      startedAt: this.startedAt,
      uptimeSeconds: this.startedAt ? (Date.now() - this.startedAt.getTime()) / 1000 : 0,
      version: RELAY_VERSION,
      listener: this.listener.getStats(),
      tak: this.takClient.getStats(),
      activeDevices: this.activeDevices.size,
      knownDevices: this.encoder.getIdentities().size,
      metrics: this.metrics.snapshot(),
    };
  }
}
