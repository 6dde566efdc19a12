/**
 * GPGGA Relay Type Definitions
 *
 * Core types shared by the ingest path (UDP + NMEA parsing), the CoT encoder,
 * and the TAK server link.
 *
 * Data flow:
 *   UDP datagram → PositionRecord → CotEvent (XML) → outbound queue → TAK socket
 */

// ═══════════════════════════════════════════════════════════════════════════════
// POSITION TYPES (output of the NMEA parser)
// ═══════════════════════════════════════════════════════════════════════════════

/** GPS fix quality code (GPGGA field 6) */
export type FixQuality = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

/** UTC time-of-day reported by the device */
export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
  /** Sub-second part, 0-999999 */
  microsecond: number;
}

/** A validated position report from one device */
export interface PositionRecord {
  /** Device-reported time of fix (absent when the device left the field empty or it was malformed) */
  timeOfFix?: TimeOfDay;

  /** Decimal degrees, south negative */
  latitude: number;

  /** Decimal degrees, west negative */
  longitude: number;

  fixQuality: FixQuality;

  numSatellites: number;

  /** Horizontal dilution of precision (0 when absent) */
  hdop: number;

  /** Meters above mean sea level */
  altitude: number;

  /** Geoid separation in meters */
  geoidSeparation?: number;

  /** Seconds since last DGPS update */
  dgpsAge?: number;

  dgpsStationId?: string;

  /** Operator-assigned device identifier (custom trailing field) */
  deviceId: string;
}

/** Where a datagram came from */
export interface SenderAddress {
  address: string;
  port: number;
  family: "IPv4" | "IPv6";
}

// ═══════════════════════════════════════════════════════════════════════════════
// COT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** CoT point element */
export interface CotPoint {
  readonly lat: number;
  readonly lon: number;
  /** Height above ellipsoid (we forward MSL altitude) */
  readonly hae: number;
  /** Circular error (m) */
  readonly ce: number;
  /** Linear error (m) */
  readonly le: number;
}

/** CoT detail payload */
export interface CotDetail {
  readonly callsign: string;
  readonly numSatellites: number;
  readonly hdop: number;
  readonly fixQuality: FixQuality;
  readonly fixQualityDescription: string;
  /** Whether to emit the <track> element (valid fix only) */
  readonly hasValidFix: boolean;
  readonly deviceUid: string;
  readonly deviceType: string;
  readonly remarks: string;
}

/** Immutable Cursor-on-Target event */
export interface CotEvent {
  readonly version: "2.0";
  readonly uid: string;
  readonly type: string;
  readonly time: Date;
  readonly start: Date;
  readonly stale: Date;
  readonly how: string;
  readonly point: CotPoint;
  readonly detail: CotDetail;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TAK CONNECTION TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** TAK link connection state */
export type TakConnectionState =
  | "disconnected"  // No socket; waiting for the next connect attempt
  | "connecting"    // Connect in progress
  | "connected";    // Socket open, writer draining the queue

/** Downstream transport */
export type TakProtocol = "tcp" | "tls";

/** Result of handing an event to the TAK link */
export type SendOutcome =
  | "queued"    // Accepted; will be written in FIFO order
  | "timeout"   // Queue stayed full for the whole send timeout
  | "error";    // Link not running or enqueue failed

/** TAK link statistics */
export interface TakClientStats {
  connected: boolean;
  state: TakConnectionState;
  messagesSent: number;
  sendErrors: number;
  /** sendErrors / (messagesSent + sendErrors) */
  errorRate: number;
  /** Messages rejected because the queue stayed full */
  dropped: number;
  queueSize: number;
  queueCapacity: number;
  /** High-water mark of queue occupancy */
  maxQueueSize: number;
  reconnectAttempts: number;
  lastConnected: Date | null;
  lastError: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LISTENER TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** UDP listener statistics */
export interface UDPListenerStats {
  startedAt: Date | null;
  messagesReceived: number;
  parseErrors: number;
  decodeErrors: number;
  /** Datagrams discarded because the handler concurrency cap was reached */
  dropped: number;
  inFlight: number;
  /** (parseErrors + decodeErrors) / messagesReceived */
  errorRate: number;
  totalBytesReceived: number;
}
