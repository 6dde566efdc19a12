/**
 * GPGGA Sentence Parser
 *
 * Parses NMEA GPGGA sentences, extended with a trailing device-identifier
 * field, into validated position records.
 *
 * Sentence format (one per UDP datagram):
 *   $GPGGA,hhmmss.sss,ddmm.mmmm,N,dddmm.mmmm,E,q,nn,hdop,alt,M,geoid,M,age,station,DEVICE*CS
 *
 * Processing order:
 * 1. Checksum (XOR of every character between '$' and '*') - nothing is
 *    interpreted until it matches
 * 2. Field grammar
 * 3. Coordinate / time decoding
 * 4. Range validation
 */

import { z } from "zod";
import { createLogger } from "../utils/logger.ts";
import type { FixQuality, PositionRecord, TimeOfDay } from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

const SENTENCE_START = "$";

const CHECKSUM_DELIMITER = "*";

/**
 * Full sentence grammar. The DGPS station field may be left out entirely
 * (devices commonly send `...,M,46.9,M,,DEVICE*CS`), and the device id is
 * free text up to the checksum.
 */
const GPGGA_PATTERN = new RegExp(
  "^\\$GPGGA," +
  "(\\d{6}(?:\\.\\d+)?)?," +       // 1  time (hhmmss.sss)
  "(\\d+\\.\\d+)," +               // 2  latitude (ddmm.mmmm)
  "([NS])," +                      // 3  latitude hemisphere
  "(\\d+\\.\\d+)," +               // 4  longitude (dddmm.mmmm)
  "([EW])," +                      // 5  longitude hemisphere
  "([0-8])," +                     // 6  fix quality
  "(\\d+)," +                      // 7  satellites in use
  "(\\d+(?:\\.\\d+)?)?," +         // 8  HDOP
  "(-?\\d+(?:\\.\\d*)?)," +        // 9  altitude
  "M," +                           //    altitude unit
  "(-?\\d+(?:\\.\\d*)?)?," +       // 10 geoid separation
  "M?," +                          //    geoid unit
  "(\\d+(?:\\.\\d*)?)?," +         // 11 DGPS age
  "(?:(\\d+)?,)?" +                // 12 DGPS station id
  "([^*]+)" +                      // 13 device id
  "\\*([0-9A-Fa-f]{2})$"           // 14 checksum
);

/** Human-readable fix quality */
export const FIX_QUALITY_DESCRIPTIONS: Record<FixQuality, string> = {
  0: "Invalid",
  1: "GPS fix",
  2: "DGPS fix",
  3: "PPS fix",
  4: "Real Time Kinematic",
  5: "Float RTK",
  6: "Estimated",
  7: "Manual input",
  8: "Simulation",
};

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Why a sentence was rejected */
export type NmeaParseErrorKind =
  | "checksum_missing"    // No '*' delimiter / empty checksum
  | "checksum_mismatch"   // Checksum present but wrong
  | "malformed_sentence"  // Checksum OK, grammar doesn't match
  | "invalid_field";      // Grammar OK, value out of range

export interface NmeaParseError {
  kind: NmeaParseErrorKind;
  reason: string;
  /** Trimmed input (truncated for logging) */
  sentence: string;
}

export type NmeaParseResult =
  | { ok: true; record: PositionRecord }
  | { ok: false; error: NmeaParseError };

/** Factory result for position records */
export type PositionRecordResult =
  | { ok: true; record: PositionRecord }
  | { ok: false; issues: string[] };

// ═══════════════════════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════════════════════

const log = createLogger("NMEA Parser");

// ═══════════════════════════════════════════════════════════════════════════════
// POSITION RECORD
// ═══════════════════════════════════════════════════════════════════════════════

const isFixQuality = (value: number): value is FixQuality =>
  Number.isInteger(value) && value >= 0 && value <= 8;

const timeOfDaySchema = z.object({
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
  second: z.number().int().min(0).max(59),
  microsecond: z.number().int().min(0).max(999_999),
});

const positionRecordSchema = z.object({
  timeOfFix: timeOfDaySchema.optional(),
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  fixQuality: z.number().refine(isFixQuality, { message: "fix quality must be an integer between 0 and 8" }),
  numSatellites: z.number().int().nonnegative(),
  hdop: z.number().finite().nonnegative(),
  altitude: z.number().finite(),
  geoidSeparation: z.number().finite().optional(),
  dgpsAge: z.number().finite().nonnegative().optional(),
  dgpsStationId: z.string().optional(),
  deviceId: z.string().trim().min(1, { message: "device id must not be empty" }),
});

/**
 * Build a position record, checking every invariant.
 * An invalid record is never returned.
 */
export function createPositionRecord(fields: Partial<Record<keyof PositionRecord, unknown>>): PositionRecordResult {
  const parsed = positionRecordSchema.safeParse(fields);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }
  return { ok: true, record: parsed.data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CHECKSUM
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * XOR checksum of a sentence body (without '$' and '*'), as two uppercase hex digits.
 * Computed over the UTF-8 bytes, so non-ASCII device ids match what the device sent.
 */
export function nmeaChecksum(body: string): string {
  let checksum = 0;
  for (const byte of Buffer.from(body, "utf8")) {
    checksum ^= byte;
  }
  return checksum.toString(16).toUpperCase().padStart(2, "0");
}

type ChecksumCheck =
  | { ok: true }
  | { ok: false; kind: "checksum_missing" | "checksum_mismatch"; reason: string };

function verifyChecksum(sentence: string): ChecksumCheck {
  const delimiterIndex = sentence.indexOf(CHECKSUM_DELIMITER);
  if (delimiterIndex === -1) {
    return { ok: false, kind: "checksum_missing", reason: "no '*' checksum delimiter" };
  }

  const parts = sentence.split(CHECKSUM_DELIMITER);
  if (parts.length > 2) {
    return { ok: false, kind: "checksum_mismatch", reason: "more than one '*' delimiter" };
  }

  let payload = parts[0];
  const supplied = parts[1];
  if (supplied === "") {
    return { ok: false, kind: "checksum_missing", reason: "empty checksum after '*'" };
  }
  if (!/^[0-9A-Fa-f]{2}$/.test(supplied)) {
    return { ok: false, kind: "checksum_mismatch", reason: `checksum "${supplied}" is not two hex digits` };
  }

  if (payload.startsWith(SENTENCE_START)) {
    payload = payload.slice(1);
  }

  const calculated = nmeaChecksum(payload);
  if (calculated !== supplied.toUpperCase()) {
    return {
      ok: false,
      kind: "checksum_mismatch",
      reason: `expected ${calculated}, got ${supplied.toUpperCase()}`,
    };
  }
  return { ok: true };
}

// ═══════════════════════════════════════════════════════════════════════════════
// FIELD DECODERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Convert NMEA ddmm.mmmm / dddmm.mmmm to signed decimal degrees.
 * The last two digits before the decimal point are whole minutes.
 */
export function parseNmeaCoordinate(value: string, hemisphere: string): number {
  const [integerPart, decimalPart = "0"] = value.split(".");

  let degrees = 0;
  let minutes: number;
  if (integerPart.length >= 2) {
    degrees = integerPart.length > 2 ? Number(integerPart.slice(0, -2)) : 0;
    minutes = Number(`${integerPart.slice(-2)}.${decimalPart}`);
  } else {
    minutes = Number(value);
  }

  const decimal = degrees + minutes / 60;
  return hemisphere === "S" || hemisphere === "W" ? -decimal : decimal;
}

/**
 * Decode hhmmss[.sss]. Returns null when the digits don't form a valid time.
 */
export function parseNmeaTime(value: string): TimeOfDay | null {
  const match = value.match(/^(\d{2})(\d{2})(\d{2})(?:\.(\d+))?$/);
  if (!match) return null;

  const fraction = match[4] ?? "";
  const time = {
    hour: Number(match[1]),
    minute: Number(match[2]),
    second: Number(match[3]),
    // Truncate to microseconds without going through floating point
    microsecond: Number(fraction.slice(0, 6).padEnd(6, "0")),
  };

  return timeOfDaySchema.safeParse(time).success ? time : null;
}

/**
 * ISO-8601 time-of-day (hh:mm:ss or hh:mm:ss.ffffff)
 */
export function formatTimeOfDay(time: TimeOfDay): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const base = `${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
  return time.microsecond > 0 ? `${base}.${String(time.microsecond).padStart(6, "0")}` : base;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PARSER
// ═══════════════════════════════════════════════════════════════════════════════

function reject(kind: NmeaParseErrorKind, reason: string, sentence: string): NmeaParseResult {
  return {
    ok: false,
    error: { kind, reason, sentence: sentence.substring(0, 200) },
  };
}

/**
 * Parse one extended GPGGA sentence
 *
 * Usage:
 * ```typescript
 * const result = parseGpggaSentence(text);
 * if (result.ok) {
 *   handle(result.record);
 * } else {
 *   count(result.error.kind);
 * }
 * ```
 */
export function parseGpggaSentence(input: string): NmeaParseResult {
  const sentence = input.trim();

  const checksum = verifyChecksum(sentence);
  if (!checksum.ok) {
    return reject(checksum.kind, checksum.reason, sentence);
  }

  const match = GPGGA_PATTERN.exec(sentence);
  if (!match) {
    return reject("malformed_sentence", "sentence does not match the GPGGA field layout", sentence);
  }

  const [
    ,
    timeStr,
    latStr,
    latHemisphere,
    lonStr,
    lonHemisphere,
    fixQualityStr,
    satellitesStr,
    hdopStr,
    altitudeStr,
    geoidStr,
    dgpsAgeStr,
    dgpsStationStr,
    deviceIdStr,
  ] = match;

  let timeOfFix: TimeOfDay | undefined;
  if (timeStr) {
    const decoded = parseNmeaTime(timeStr);
    if (decoded) {
      timeOfFix = decoded;
    } else {
      log.warn("Invalid time field, omitting", { time: timeStr });
    }
  }

  const result = createPositionRecord({
    ...(timeOfFix ? { timeOfFix } : {}),
    latitude: parseNmeaCoordinate(latStr, latHemisphere),
    longitude: parseNmeaCoordinate(lonStr, lonHemisphere),
    fixQuality: Number(fixQualityStr),
    numSatellites: Number(satellitesStr),
    hdop: hdopStr ? Number(hdopStr) : 0,
    altitude: Number(altitudeStr),
    ...(geoidStr ? { geoidSeparation: Number(geoidStr) } : {}),
    ...(dgpsAgeStr ? { dgpsAge: Number(dgpsAgeStr) } : {}),
    ...(dgpsStationStr ? { dgpsStationId: dgpsStationStr } : {}),
    deviceId: deviceIdStr,
  });

  if (!result.ok) {
    return reject("invalid_field", result.issues.join("; "), sentence);
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SENTENCE BUILDING (test senders)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format minutes, handling the edge case where rounding pushes minutes to 60.
 */
function formatMinutes(minutes: number, decimals: number): { overflow: number; formatted: string } {
  const rounded = Number(minutes.toFixed(decimals));
  if (rounded >= 60) {
    return { overflow: 1, formatted: (0).toFixed(decimals) };
  }
  return { overflow: 0, formatted: rounded.toFixed(decimals) };
}

function toNmeaCoordinate(decimal: number, degreeDigits: number, decimals: number): string {
  const abs = Math.abs(decimal);
  let degrees = Math.floor(abs);
  const { overflow, formatted } = formatMinutes((abs - degrees) * 60, decimals);
  degrees += overflow;
  return `${String(degrees).padStart(degreeDigits, "0")}${formatted.padStart(decimals + 3, "0")}`;
}

/** Decimal-degree latitude to NMEA ddmm.mmmm + hemisphere */
export function toNmeaLatitude(decimal: number, decimals = 4): { value: string; hemisphere: "N" | "S" } {
  return { value: toNmeaCoordinate(decimal, 2, decimals), hemisphere: decimal >= 0 ? "N" : "S" };
}

/** Decimal-degree longitude to NMEA dddmm.mmmm + hemisphere */
export function toNmeaLongitude(decimal: number, decimals = 4): { value: string; hemisphere: "E" | "W" } {
  return { value: toNmeaCoordinate(decimal, 3, decimals), hemisphere: decimal >= 0 ? "E" : "W" };
}

export interface GpggaSentenceOptions {
  deviceId: string;
  latitude: number;
  longitude: number;
  altitude: number;
  fixQuality?: FixQuality;
  numSatellites?: number;
  hdop?: number;
  geoidSeparation?: number;
  /** Fix time (UTC); defaults to now */
  time?: Date;
}

/**
 * Build a complete extended GPGGA sentence with checksum
 */
export function formatGpggaSentence(options: GpggaSentenceOptions): string {
  const time = options.time ?? new Date();
  const pad = (n: number) => String(n).padStart(2, "0");
  const hhmmss = `${pad(time.getUTCHours())}${pad(time.getUTCMinutes())}${pad(time.getUTCSeconds())}.00`;

  const lat = toNmeaLatitude(options.latitude);
  const lon = toNmeaLongitude(options.longitude);

  const body = [
    "GPGGA",
    hhmmss,
    lat.value,
    lat.hemisphere,
    lon.value,
    lon.hemisphere,
    String(options.fixQuality ?? 1),
    pad(options.numSatellites ?? 8),
    (options.hdop ?? 0.9).toFixed(1),
    options.altitude.toFixed(1),
    "M",
    (options.geoidSeparation ?? 46.9).toFixed(1),
    "M",
    "",
    options.deviceId,
  ].join(",");

  return `${SENTENCE_START}${body}${CHECKSUM_DELIMITER}${nmeaChecksum(body)}`;
}
