/**
 * Device Identity Cache
 *
 * Maps device ids to stable CoT uids. Entries are created on first sighting
 * and live for the process lifetime; the uid is derived deterministically, so
 * a restart reproduces the same uids.
 */

import { createLogger } from "../utils/logger.ts";
import { deviceUuid } from "../utils/uuid.ts";
import { noopMetrics, type MetricsSink } from "../relay/metrics.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Prefix of every device uid on the wire */
export const DEVICE_UID_PREFIX = "GPGGA-";

export interface DeviceIdentity {
  deviceId: string;
  uid: string;
  firstSeenAt: Date;
}

export type DeviceIdentityEvent = "device:new";

export type DeviceIdentityCallback = (identity: DeviceIdentity) => void;

const log = createLogger("Device Identity");

// ═══════════════════════════════════════════════════════════════════════════════
// DEVICE IDENTITY CACHE
// ═══════════════════════════════════════════════════════════════════════════════

export class DeviceIdentityCache {
  private identities: Map<string, DeviceIdentity> = new Map();
  private listeners: Map<DeviceIdentityEvent, Set<DeviceIdentityCallback>> = new Map([
    ["device:new", new Set<DeviceIdentityCallback>()],
  ]);
  private metrics: MetricsSink;

  constructor(metrics: MetricsSink = noopMetrics) {
    this.metrics = metrics;
  }

  /**
   * Get the uid for a device, creating it on first sighting.
   * Lookup and insert happen in one synchronous step.
   */
  getUid(deviceId: string): string {
    const existing = this.identities.get(deviceId);
    if (existing) {
      return existing.uid;
    }

    const identity: DeviceIdentity = {
      deviceId,
      uid: `${DEVICE_UID_PREFIX}${deviceUuid(deviceId)}`,
      firstSeenAt: new Date(),
    };
    this.identities.set(deviceId, identity);
    this.metrics.increment("devicesCreated");

    log.info(`New device: ${deviceId}`, { uid: identity.uid });
    this.emit("device:new", identity);

    return identity.uid;
  }

  has(deviceId: string): boolean {
    return this.identities.has(deviceId);
  }

  get size(): number {
    return this.identities.size;
  }

  getAll(): DeviceIdentity[] {
    return Array.from(this.identities.values());
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // EVENT HANDLING
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Subscribe to identity events. Returns an unsubscribe function.
   */
  on(event: DeviceIdentityEvent, callback: DeviceIdentityCallback): () => void {
    this.listeners.get(event)?.add(callback);
    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  private emit(event: DeviceIdentityEvent, identity: DeviceIdentity): void {
    const callbacks = this.listeners.get(event);
    if (!callbacks) return;
    for (const callback of callbacks) {
      try {
        callback(identity);
      } catch (error) {
        log.error(`Error in ${event} listener`, { error });
      }
    }
  }
}
