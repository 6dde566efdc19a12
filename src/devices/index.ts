/**
 * Devices Module
 *
 * Ingest side of the relay: UDP listener and GPGGA sentence parsing.
 */

// UDP Listener
export { UDPListener } from "./udp-listener.ts";
export type { PositionHandler, UDPListenerOptions } from "./udp-listener.ts";

// NMEA Parser
export {
  parseGpggaSentence,
  createPositionRecord,
  nmeaChecksum,
  parseNmeaCoordinate,
  parseNmeaTime,
  formatTimeOfDay,
  formatGpggaSentence,
  toNmeaLatitude,
  toNmeaLongitude,
  FIX_QUALITY_DESCRIPTIONS,
} from "./nmea-parser.ts";
export type {
  NmeaParseError,
  NmeaParseErrorKind,
  NmeaParseResult,
  PositionRecordResult,
  GpggaSentenceOptions,
} from "./nmea-parser.ts";
