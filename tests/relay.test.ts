/**
 * Tests for Relay pipeline wiring
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Relay } from "../src/relay/index.ts";
import type { PositionRecord, SenderAddress } from "../src/types/index.ts";

const SENDER: SenderAddress = { address: "127.0.0.1", port: 40000, family: "IPv4" };

function makeRecord(deviceId: string): PositionRecord {
  return {
    latitude: 48.1173,
    longitude: 11.516666666666667,
    fixQuality: 1,
    numSatellites: 8,
    hdop: 0.9,
    altitude: 545.4,
    deviceId,
  };
}

describe("Relay", () => {
  let relay: Relay;

  beforeEach(() => {
    relay = new Relay({
      listener: { host: "127.0.0.1", port: 0 },
      tak: { host: "127.0.0.1", port: 1, protocol: "tcp", certFile: null, keyFile: null, caFile: null },
    });
  });

  afterEach(async () => {
    await relay.stop();
  });

  describe("handlePosition", () => {
    it("should convert the record and count a refused send", async () => {
      // TAK client is not running, so the send is refused
      const outcome = await relay.handlePosition(makeRecord("DEV1"), SENDER);

      expect(outcome).toBe("error");
      expect(relay.metrics.getCounter("cotConversions")).toBe(1);
      expect(relay.metrics.getCounter("cotSendErrors")).toBe(1);
      expect(relay.metrics.getCounter("cotQueued")).toBe(0);
      expect(relay.metrics.getCounter("devicesCreated")).toBe(1);
      expect(relay.metrics.snapshot().processingTime.count).toBe(1);
    });

    it("should track active devices", async () => {
      await relay.handlePosition(makeRecord("DEV1"), SENDER);
      await relay.handlePosition(makeRecord("DEV2"), SENDER);
      await relay.handlePosition(makeRecord("DEV1"), SENDER);

      expect(relay.getActiveDevices()).toEqual(["DEV1", "DEV2"]);
      expect(relay.metrics.getGauge("activeDevices")).toBe(2);
      expect(relay.metrics.getCounter("devicesCreated")).toBe(2);
    });

    it("should stop at a conversion failure without sending", async () => {
      vi.spyOn(relay.encoder.getIdentities(), "getUid").mockImplementation(() => {
        throw new Error("identity store unavailable");
      });
      const send = vi.spyOn(relay.takClient, "send");

      const outcome = await relay.handlePosition(makeRecord("DEV1"), SENDER);

      expect(outcome).toBeNull();
      expect(send).not.toHaveBeenCalled();
      expect(relay.metrics.getCounter("conversionErrors")).toBe(1);
      expect(relay.metrics.snapshot().processingTime.count).toBe(1);
    });
  });

  describe("clearActiveDevices", () => {
    it("should forget active devices but keep identities", async () => {
      await relay.handlePosition(makeRecord("DEV1"), SENDER);
      await relay.handlePosition(makeRecord("DEV2"), SENDER);

      expect(relay.clearActiveDevices()).toBe(2);

      const status = relay.getStatus();
      expect(status.activeDevices).toBe(0);
      expect(status.knownDevices).toBe(2);
      expect(relay.metrics.getGauge("activeDevices")).toBe(0);
    });
  });

  describe("getStatus", () => {
    it("should describe a relay that has not started", () => {
      const status = relay.getStatus();

      expect(status.running).toBe(false);
      expect(status.startedAt).toBeNull();
      expect(status.uptimeSeconds).toBe(0);
      expect(status.version).toBe("1.0.0");
      expect(status.tak.state).toBe("disconnected");
      expect(status.listener.messagesReceived).toBe(0);
    });
  });

  describe("periodic cleanup", () => {
    it("should clear active devices on the cleanup interval", async () => {
      await relay.stop();
      relay = new Relay({
        listener: { host: "127.0.0.1", port: 0 },
        tak: { host: "127.0.0.1", port: 1, protocol: "tcp", reconnectIntervalMs: 60_000 },
        deviceCleanupIntervalMs: 50,
        monitorIntervalMs: 60_000,
      });
      await relay.start();
      await relay.handlePosition(makeRecord("DEV1"), SENDER);
      expect(relay.getActiveDevices()).toEqual(["DEV1"]);

      await vi.waitFor(() => {
        expect(relay.getActiveDevices()).toEqual([]);
      });
      expect(relay.getStatus().knownDevices).toBe(1);
    });
  });
});
