/**
 * CoT Encoder
 *
 * Converts position records into Cursor-on-Target events and serializes
 * them to the XML understood by TAK servers.
 *
 * Output shape:
 * ```xml
 * <event version="2.0" uid="GPGGA-..." type="a-f-G-U-C" time="..." start="..." stale="..." how="h-gps">
 *   <point lat="48.1173" lon="11.516666666666667" hae="545.4" ce="4.5" le="4.5" />
 *   <detail>
 *     <contact callsign="DEV1" />
 *     <precisionlocation altsrc="GPS" geopointsrc="GPS" />
 *     <track course="0.0" speed="0.0" />
 *     <__gps numSats="8" hdop="0.9" fixQuality="1" fixQualityDesc="GPS fix" />
 *     <__device uid="DEV1" type="GPS Tracker" />
 *     <remarks>GPGGA Device: DEV1, GPS Time: 12:35:19</remarks>
 *   </detail>
 * </event>
 * ```
 * (emitted on a single line)
 */

import { createLogger } from "../utils/logger.ts";
import { getErrorMessage } from "../types/errors.ts";
import { noopMetrics, type MetricsSink } from "../relay/metrics.ts";
import { DeviceIdentityCache } from "./device-identity.ts";
import { FIX_QUALITY_DESCRIPTIONS, formatTimeOfDay } from "../devices/nmea-parser.ts";
import type { CotEvent, FixQuality, PositionRecord } from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** CoT `how` per fix quality */
const HOW_BY_FIX_QUALITY: Record<FixQuality, string> = {
  0: "h-g-i-g-o",  // Invalid
  1: "h-gps",
  2: "h-dgps",
  3: "h-pps",
  4: "h-rtk",
  5: "h-rtk",      // Float RTK
  6: "h-e",        // Estimated
  7: "h-m",        // Manual
  8: "h-s",        // Simulation
};

const DEFAULT_HOW = "h-gps";

/** Base horizontal error (m) per fix quality, before HDOP scaling */
const BASE_ERROR_METERS: Record<FixQuality, number> = {
  0: 9999,
  1: 5,
  2: 2,
  3: 1,
  4: 0.1,
  5: 0.5,
  6: 10,
  7: 50,
  8: 100,
};

const DEFAULT_BASE_ERROR_METERS = 10;

const MAX_ERROR_METERS = 9999;

const DEVICE_INFO_TYPE = "GPS Tracker";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface CotEncoderOptions {
  /** CoT type attribute (e.g. a-f-G-U-C) */
  deviceType: string;
  /** Seconds until the event is stale */
  staleTimeSeconds: number;
  /** Identity cache; a fresh one is created when omitted */
  identities?: DeviceIdentityCache;
  metrics?: MetricsSink;
}

export interface CotConversionError {
  kind: "conversion_failure";
  deviceId: string;
  reason: string;
}

export type CotConversionResult =
  | { ok: true; event: CotEvent; xml: string }
  | { ok: false; error: CotConversionError };

const log = createLogger("CoT Encoder");

// ═══════════════════════════════════════════════════════════════════════════════
// FIELD HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

const isKnownFixQuality = (value: number): value is FixQuality =>
  Number.isInteger(value) && value >= 0 && value <= 8;

export function howForFixQuality(fixQuality: number): string {
  return isKnownFixQuality(fixQuality) ? HOW_BY_FIX_QUALITY[fixQuality] : DEFAULT_HOW;
}

/**
 * Circular error in meters: base error for the fix quality, scaled by HDOP
 * when it is known, capped at 9999.
 */
export function calculateCircularError(fixQuality: number, hdop: number): number {
  const base = isKnownFixQuality(fixQuality) ? BASE_ERROR_METERS[fixQuality] : DEFAULT_BASE_ERROR_METERS;
  if (hdop > 0) {
    return Math.min(base * hdop, MAX_ERROR_METERS);
  }
  return base;
}

/**
 * CoT timestamp: YYYY-MM-DDTHH:MM:SS.ffffffZ (UTC, microseconds)
 */
export function formatCotTime(date: Date): string {
  // toISOString has millisecond precision; pad to microseconds
  return `${date.toISOString().slice(0, -1)}000Z`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// XML SERIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

function escapeText(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

function escapeAttribute(value: string): string {
  return escapeText(value)
    .replace(/"/g, "&quot;")
    .replace(/\n/g, "&#10;")
    .replace(/\r/g, "&#13;")
    .replace(/\t/g, "&#09;");
}

type Attributes = Record<string, string | number>;

function attrs(attributes: Attributes): string {
  return Object.entries(attributes)
    .map(([name, value]) => ` ${name}="${escapeAttribute(String(value))}"`)
    .join("");
}

function emptyElement(name: string, attributes: Attributes): string {
  return `<${name}${attrs(attributes)} />`;
}

/**
 * Serialize an event to a single-line XML document
 */
export function toCotXml(event: CotEvent): string {
  const { point, detail } = event;

  const detailChildren = [
    emptyElement("contact", { callsign: detail.callsign }),
    emptyElement("precisionlocation", { altsrc: "GPS", geopointsrc: "GPS" }),
    // GPGGA carries no course or speed
    detail.hasValidFix ? emptyElement("track", { course: "0.0", speed: "0.0" }) : "",
    emptyElement("__gps", {
      numSats: detail.numSatellites,
      hdop: detail.hdop,
      fixQuality: detail.fixQuality,
      fixQualityDesc: detail.fixQualityDescription,
    }),
    emptyElement("__device", { uid: detail.deviceUid, type: detail.deviceType }),
    `<remarks>${escapeText(detail.remarks)}</remarks>`,
  ].join("");

  return (
    `<event${attrs({
      version: event.version,
      uid: event.uid,
      type: event.type,
      time: formatCotTime(event.time),
      start: formatCotTime(event.start),
      stale: formatCotTime(event.stale),
      how: event.how,
    })}>` +
    emptyElement("point", { lat: point.lat, lon: point.lon, hae: point.hae, ce: point.ce, le: point.le }) +
    `<detail>${detailChildren}</detail>` +
    `</event>`
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENCODER
// ═══════════════════════════════════════════════════════════════════════════════

export class CotEncoder {
  private deviceType: string;
  private staleTimeMs: number;
  private identities: DeviceIdentityCache;
  private metrics: MetricsSink;

  constructor(options: CotEncoderOptions) {
    this.deviceType = options.deviceType;
    this.staleTimeMs = options.staleTimeSeconds * 1000;
    this.metrics = options.metrics ?? noopMetrics;
    this.identities = options.identities ?? new DeviceIdentityCache(this.metrics);
  }

  /**
   * Build the event for a record. `now` becomes time and start.
   */
  encode(record: PositionRecord, now: Date = new Date()): CotEvent {
    const uid = this.identities.getUid(record.deviceId);
    const errorMeters = calculateCircularError(record.fixQuality, record.hdop);

    let remarks = `GPGGA Device: ${record.deviceId}`;
    if (record.timeOfFix) {
      remarks += `, GPS Time: ${formatTimeOfDay(record.timeOfFix)}`;
    }

    const time = new Date(now.getTime());

    const event: CotEvent = {
      version: "2.0",
      uid,
      type: this.deviceType,
      time,
      start: time,
      stale: new Date(now.getTime() + this.staleTimeMs),
      how: howForFixQuality(record.fixQuality),
      point: Object.freeze({
        lat: record.latitude,
        lon: record.longitude,
        // MSL altitude is forwarded as-is
        hae: record.altitude,
        ce: errorMeters,
        le: errorMeters,
      }),
      detail: Object.freeze({
        callsign: record.deviceId,
        numSatellites: record.numSatellites,
        hdop: record.hdop,
        fixQuality: record.fixQuality,
        fixQualityDescription: FIX_QUALITY_DESCRIPTIONS[record.fixQuality],
        hasValidFix: record.fixQuality > 0,
        deviceUid: record.deviceId,
        deviceType: DEVICE_INFO_TYPE,
        remarks,
      }),
    };
    return Object.freeze(event);
  }

  /**
   * Encode and serialize. Failures are returned, never thrown.
   */
  convert(record: PositionRecord, now: Date = new Date()): CotConversionResult {
    try {
      const event = this.encode(record, now);
      const xml = toCotXml(event);
      this.metrics.increment("cotConversions");

      log.debug("Converted position to CoT", {
        deviceId: record.deviceId,
        uid: event.uid,
        lat: record.latitude,
        lon: record.longitude,
        alt: record.altitude,
      });

      return { ok: true, event, xml };
    } catch (error) {
      const reason = getErrorMessage(error);
      this.metrics.increment("conversionErrors");
      log.error("Failed to convert position to CoT", { deviceId: record.deviceId, error: reason });
      return { ok: false, error: { kind: "conversion_failure", deviceId: record.deviceId, reason } };
    }
  }

  getIdentities(): DeviceIdentityCache {
    return this.identities;
  }
}
