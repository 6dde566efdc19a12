/**
 * Tests for the GPGGA sentence parser
 */

import { describe, it, expect } from "vitest";
import {
  createPositionRecord,
  formatGpggaSentence,
  formatTimeOfDay,
  nmeaChecksum,
  parseGpggaSentence,
  parseNmeaCoordinate,
  parseNmeaTime,
  toNmeaLatitude,
  toNmeaLongitude,
} from "../src/devices/nmea-parser.ts";

const MUNICH = "$GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,DEV1*21";
const FULL_FIELDS = "$GPGGA,123519.50,3723.2475,S,12158.3416,W,2,12,1.2,18.9,M,-25.7,M,2.5,0123,UNIT-7*62";
const UMLAUT_BODY = "GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,GERÄT-1";
const NO_FIX = "$GPGGA,,4807.038,N,01131.000,E,0,00,,545.4,M,,,,DEV1*5A";

describe("NMEA Parser", () => {
  // ═══════════════════════════════════════════════════════════════════════════
  // CHECKSUM
  // ═══════════════════════════════════════════════════════════════════════════

  describe("nmeaChecksum", () => {
    it("should XOR every character of the body", () => {
      expect(nmeaChecksum("GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,DEV1")).toBe("21");
    });

    it("should pad single-digit checksums to two characters", () => {
      expect(nmeaChecksum("A")).toBe("41");
      expect(nmeaChecksum("AB")).toBe("03");
      expect(nmeaChecksum("")).toBe("00");
    });

    it("should XOR the UTF-8 bytes of non-ASCII device ids", () => {
      expect(nmeaChecksum(UMLAUT_BODY)).toBe("18");
    });

    it("should accept a non-ASCII device id with its byte checksum", () => {
      const result = parseGpggaSentence(`$${UMLAUT_BODY}*18`);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record.deviceId).toBe("GERÄT-1");
    });

    it("should reject a checksum taken over characters instead of bytes", () => {
      expect(parseGpggaSentence(`$${UMLAUT_BODY}*9B`).ok).toBe(false);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // VALID SENTENCES
  // ═══════════════════════════════════════════════════════════════════════════

  describe("parseGpggaSentence - valid sentences", () => {
    it("should parse a standard sentence without a DGPS station field", () => {
      const result = parseGpggaSentence(MUNICH);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record).toEqual({
        timeOfFix: { hour: 12, minute: 35, second: 19, microsecond: 0 },
        latitude: 48.1173,
        longitude: 11.516666666666667,
        fixQuality: 1,
        numSatellites: 8,
        hdop: 0.9,
        altitude: 545.4,
        geoidSeparation: 46.9,
        deviceId: "DEV1",
      });
    });

    it("should parse every optional field when present", () => {
      const result = parseGpggaSentence(FULL_FIELDS);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record.timeOfFix).toEqual({ hour: 12, minute: 35, second: 19, microsecond: 500000 });
      expect(result.record.latitude).toBe(-37.387458333333335);
      expect(result.record.longitude).toBe(-121.97236);
      expect(result.record.fixQuality).toBe(2);
      expect(result.record.numSatellites).toBe(12);
      expect(result.record.hdop).toBe(1.2);
      expect(result.record.altitude).toBe(18.9);
      expect(result.record.geoidSeparation).toBe(-25.7);
      expect(result.record.dgpsAge).toBe(2.5);
      expect(result.record.dgpsStationId).toBe("0123");
      expect(result.record.deviceId).toBe("UNIT-7");
    });

    it("should omit empty optional fields and default HDOP to 0", () => {
      const result = parseGpggaSentence(NO_FIX);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record.timeOfFix).toBeUndefined();
      expect(result.record.geoidSeparation).toBeUndefined();
      expect(result.record.dgpsAge).toBeUndefined();
      expect(result.record.dgpsStationId).toBeUndefined();
      expect(result.record.hdop).toBe(0);
      expect(result.record.fixQuality).toBe(0);
      expect(result.record.numSatellites).toBe(0);
    });

    it("should ignore surrounding whitespace and line endings", () => {
      const result = parseGpggaSentence(`  ${MUNICH}\r\n`);
      expect(result.ok).toBe(true);
    });

    it("should accept a lowercase checksum", () => {
      const result = parseGpggaSentence(NO_FIX.replace("*5A", "*5a"));
      expect(result.ok).toBe(true);
    });

    it("should omit an out-of-range time but keep the position", () => {
      const result = parseGpggaSentence("$GPGGA,256199,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,DEV1*2C");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record.timeOfFix).toBeUndefined();
      expect(result.record.latitude).toBe(48.1173);
    });

    it("should keep markup characters in the device id verbatim", () => {
      const result = parseGpggaSentence("$GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,R&D <team>*48");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record.deviceId).toBe("R&D <team>");
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // REJECTED SENTENCES
  // ═══════════════════════════════════════════════════════════════════════════

  describe("parseGpggaSentence - rejected sentences", () => {
    it("should reject a sentence without a checksum delimiter", () => {
      const result = parseGpggaSentence("$GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,DEV1");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("checksum_missing");
      expect(result.error.reason).toBe("no '*' checksum delimiter");
    });

    it("should reject an empty checksum", () => {
      const result = parseGpggaSentence("$GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,DEV1*");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("checksum_missing");
    });

    it("should reject a wrong checksum and report both values", () => {
      const result = parseGpggaSentence(MUNICH.replace("*21", "*22"));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("checksum_mismatch");
      expect(result.error.reason).toBe("expected 21, got 22");
    });

    it("should reject a checksum that is not two hex digits", () => {
      const result = parseGpggaSentence(MUNICH.replace("*21", "*ZZ"));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("checksum_mismatch");
    });

    it("should reject more than one checksum delimiter", () => {
      const result = parseGpggaSentence(`${MUNICH}*21`);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("checksum_mismatch");
      expect(result.error.reason).toBe("more than one '*' delimiter");
    });

    it("should verify the checksum before looking at the fields", () => {
      // Valid layout for another talker, bad checksum: checksum wins
      const result = parseGpggaSentence(
        "$GPRMC,123519,A,4807.038,N,01131.000,E,022.4,084.4,230394,003.1,W,DEV1*00"
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("checksum_mismatch");
    });

    it("should reject other sentence types as malformed", () => {
      const result = parseGpggaSentence(
        "$GPRMC,123519,A,4807.038,N,01131.000,E,022.4,084.4,230394,003.1,W,DEV1*20"
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("malformed_sentence");
      expect(result.error.reason).toBe("sentence does not match the GPGGA field layout");
    });

    it("should reject a fix quality outside 0-8 as malformed", () => {
      const result = parseGpggaSentence("$GPGGA,123519,4807.038,N,01131.000,E,9,08,0.9,545.4,M,46.9,M,,DEV1*29");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("malformed_sentence");
    });

    it("should reject an out-of-range latitude as an invalid field", () => {
      const result = parseGpggaSentence("$GPGGA,123519,9107.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,DEV1*25");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("invalid_field");
      expect(result.error.reason).toMatch(/^latitude: /);
    });

    it("should reject an out-of-range longitude as an invalid field", () => {
      const result = parseGpggaSentence("$GPGGA,123519,4807.038,N,18131.000,E,1,08,0.9,545.4,M,46.9,M,,DEV1*29");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("invalid_field");
      expect(result.error.reason).toMatch(/^longitude: /);
    });

    it("should reject a blank device id", () => {
      const result = parseGpggaSentence("$GPGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,   *67");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("invalid_field");
      expect(result.error.reason).toBe("deviceId: device id must not be empty");
    });

    it("should truncate the echoed sentence to 200 characters", () => {
      const result = parseGpggaSentence(`$${"X".repeat(300)}`);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.sentence).toHaveLength(200);
    });

    it("should reject an empty datagram", () => {
      const result = parseGpggaSentence("");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("checksum_missing");
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // FIELD DECODERS
  // ═══════════════════════════════════════════════════════════════════════════

  describe("parseNmeaCoordinate", () => {
    it("should split degrees from minutes", () => {
      expect(parseNmeaCoordinate("4807.038", "N")).toBe(48.1173);
      expect(parseNmeaCoordinate("01131.000", "E")).toBe(11.516666666666667);
    });

    it("should negate southern and western hemispheres", () => {
      expect(parseNmeaCoordinate("0030.000", "S")).toBe(-0.5);
      expect(parseNmeaCoordinate("00030.000", "W")).toBe(-0.5);
    });

    it("should treat a two-digit integer part as minutes only", () => {
      expect(parseNmeaCoordinate("30.000", "N")).toBe(0.5);
    });
  });

  describe("parseNmeaTime", () => {
    it("should decode whole seconds", () => {
      expect(parseNmeaTime("123519")).toEqual({ hour: 12, minute: 35, second: 19, microsecond: 0 });
    });

    it("should truncate fractions to microseconds", () => {
      expect(parseNmeaTime("000000.1234567")).toEqual({ hour: 0, minute: 0, second: 0, microsecond: 123456 });
    });

    it("should reject impossible times", () => {
      expect(parseNmeaTime("246000")).toBeNull();
      expect(parseNmeaTime("126000")).toBeNull();
      expect(parseNmeaTime("12351")).toBeNull();
    });
  });

  describe("formatTimeOfDay", () => {
    it("should omit a zero fraction", () => {
      expect(formatTimeOfDay({ hour: 9, minute: 5, second: 3, microsecond: 0 })).toBe("09:05:03");
    });

    it("should print six fraction digits", () => {
      expect(formatTimeOfDay({ hour: 12, minute: 35, second: 19, microsecond: 500000 })).toBe("12:35:19.500000");
      expect(formatTimeOfDay({ hour: 12, minute: 35, second: 19, microsecond: 42 })).toBe("12:35:19.000042");
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // POSITION RECORDS
  // ═══════════════════════════════════════════════════════════════════════════

  describe("createPositionRecord", () => {
    const valid = {
      latitude: 10,
      longitude: 20,
      fixQuality: 1,
      numSatellites: 5,
      hdop: 1,
      altitude: 0,
      deviceId: "DEV1",
    };

    it("should accept a valid record", () => {
      const result = createPositionRecord(valid);
      expect(result).toEqual({ ok: true, record: valid });
    });

    it("should list every violated invariant", () => {
      const result = createPositionRecord({ ...valid, latitude: 95, numSatellites: -1, fixQuality: 12 });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.issues).toHaveLength(3);
      expect(result.issues).toContain("fixQuality: fix quality must be an integer between 0 and 8");
    });

    it("should reject a negative HDOP", () => {
      const result = createPositionRecord({ ...valid, hdop: -0.5 });
      expect(result.ok).toBe(false);
    });

    it("should reject a missing device id", () => {
      const { deviceId: _omitted, ...withoutDevice } = valid;
      const result = createPositionRecord(withoutDevice);
      expect(result.ok).toBe(false);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // SENTENCE BUILDING
  // ═══════════════════════════════════════════════════════════════════════════

  describe("toNmeaLatitude / toNmeaLongitude", () => {
    it("should pad degrees and pick the hemisphere", () => {
      expect(toNmeaLatitude(48.1173)).toEqual({ value: "4807.0380", hemisphere: "N" });
      expect(toNmeaLongitude(-0.5)).toEqual({ value: "00030.0000", hemisphere: "W" });
    });

    it("should carry rounded minutes into the degrees", () => {
      expect(toNmeaLatitude(10.999999999)).toEqual({ value: "1100.0000", hemisphere: "N" });
    });
  });

  describe("formatGpggaSentence", () => {
    it("should build a sentence the parser accepts", () => {
      const sentence = formatGpggaSentence({
        deviceId: "UNIT-7",
        latitude: 48.1173,
        longitude: 11.516666666666667,
        altitude: 545.4,
        time: new Date(Date.UTC(2024, 0, 1, 12, 35, 19)),
      });

      expect(sentence.startsWith("$GPGGA,123519.00,4807.0380,N,01131.0000,E,1,08,0.9,545.4,M,46.9,M,,UNIT-7*")).toBe(true);

      const result = parseGpggaSentence(sentence);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record.deviceId).toBe("UNIT-7");
      expect(result.record.latitude).toBeCloseTo(48.1173, 6);
      expect(result.record.longitude).toBeCloseTo(11.516666666666667, 6);
      expect(result.record.timeOfFix).toEqual({ hour: 12, minute: 35, second: 19, microsecond: 0 });
    });
  });
});
